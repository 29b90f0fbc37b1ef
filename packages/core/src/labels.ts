/**
 * Label and Annotation Keys
 *
 * Every object the reconciler creates is stamped with these labels, and the
 * same labels scope list queries. Annotations carry the only state that
 * survives between passes.
 */

export const LABEL_PREFIX = 'shardwarden.dev'

export const ComponentLabel = `${LABEL_PREFIX}/component`
export const ClusterLabel = `${LABEL_PREFIX}/cluster`
export const KeyspaceLabel = `${LABEL_PREFIX}/keyspace`
export const ShardLabel = `${LABEL_PREFIX}/shard`
export const CellLabel = `${LABEL_PREFIX}/cell`
export const TabletUidLabel = `${LABEL_PREFIX}/tablet-uid`
export const TabletTypeLabel = `${LABEL_PREFIX}/tablet-type`
export const TabletIndexLabel = `${LABEL_PREFIX}/tablet-index`

/** Value of ComponentLabel on tablet Pods and PVCs. */
export const TabletComponentName = 'tablet'

/** Shard generation last applied to a Pod by an in-place update. */
export const ObservedShardGenerationAnnotation = `${LABEL_PREFIX}/observed-shard-generation`

/** Target size of a completed volume expansion waiting for a filesystem resize. */
export const PvcFilesystemResizeAnnotation = `${LABEL_PREFIX}/pvc-filesystem-resize`

// Drain protocol, owned by the external drain controller.
export const DrainSupportedAnnotation = `drain.${LABEL_PREFIX}/supported`
export const DrainStartedAnnotation = `drain.${LABEL_PREFIX}/started`
export const DrainFinishedAnnotation = `drain.${LABEL_PREFIX}/finished`

// Rolling-recreate protocol, released by external rollout logic.
export const RolloutScheduledAnnotation = `rollout.${LABEL_PREFIX}/scheduled`
export const RolloutReleasedAnnotation = `rollout.${LABEL_PREFIX}/released`

/**
 * Format a label map as a Kubernetes label selector.
 * @example 'a=1,b=2'
 */
export function labelSelector(labels: Record<string, string>): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(',')
}

/**
 * Whether `labels` contains every pair in `selector`.
 */
export function matchesLabels(
  labels: Record<string, string> | undefined,
  selector: Record<string, string>,
): boolean {
  return Object.entries(selector).every(([k, v]) => labels?.[k] === v)
}
