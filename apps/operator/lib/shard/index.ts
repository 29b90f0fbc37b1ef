export {
  TABLET_AVAILABLE_MS,
  isPodReady,
  isPodRunning,
  podReadyCondition,
  tabletAvailableStatus,
} from './availability'
export { lowerGenerationMark, observedShardGeneration, stampObservedGeneration } from './generation'
export { interpolateEnvVars, loadShardFile, loadShards, loadShardsFromDir, parseShardYaml } from './loader'
export { type PrimaryCheck, type PrimaryCheckOptions, TimeoutError, checkTabletPrimary } from './primary'
export {
  type TabletPassOutcome,
  type TabletReconcilerDeps,
  reconcileTablets,
  shardId,
  shardParentRef,
} from './reconcile-tablets'
export { applyFilesystemResizeAnnotation, hasFileSystemResizePending } from './resize'
export {
  OrphanReason,
  TURNDOWN_DRAIN_REASON,
  type TabletTurndownContext,
  prepareTabletPodForTurndown,
  prepareTabletPvcForTurndown,
} from './turndown'
