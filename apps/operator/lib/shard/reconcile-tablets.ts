/**
 * Tablet Reconciliation Pass
 *
 * One pass for one shard: compile the desired tablets, reconcile their data
 * volume claims, then their Pods, and build the shard status from scratch.
 * Claims go first because Pod updates read the claims' resize state.
 */

import type { V1PersistentVolumeClaim, V1Pod } from '@kubernetes/client-node'
import {
  type ClusterStore,
  type ObjectKey,
  type ShardManifest,
  type ShardStatus,
  type TopologyClient,
  conditionStatus,
  keyRangeSafeName,
  newShardStatus,
  newTabletStatus,
  objectKeyString,
  tabletAliasString,
} from '@shardwarden/core'
import type { Logger } from '../logger'
import { reconcileDuration, recordShardStatus } from '../metrics'
import {
  type ObjectSetResult,
  type ParentRef,
  type Strategy,
  objectSetPassResult,
  reconcileObjectSet,
} from '../reconciler'
import { type PassResult, ResultBuilder } from '../results/builder'
import { scheduledChanges } from '../rollout'
import { desiredTablets, shardTabletLabels } from '../tablet/desired'
import { tabletObjectName } from '../tablet/identity'
import { aliasFromPod, newPod, updatePod, updatePodInPlace } from '../tablet/pod'
import { newPvc, updatePvcInPlace } from '../tablet/pvc'
import type { TabletSpec } from '../tablet/spec'
import { isPodReady, isPodRunning, tabletAvailableStatus } from './availability'
import { lowerGenerationMark, observedShardGeneration, stampObservedGeneration } from './generation'
import { applyFilesystemResizeAnnotation } from './resize'
import { prepareTabletPodForTurndown, prepareTabletPvcForTurndown } from './turndown'

export interface TabletReconcilerDeps {
  store: ClusterStore
  topology: TopologyClient
  logger: Logger

  /** Bound on each primary lookup. */
  topoTimeoutMs: number

  /** Clock for availability checks. */
  now?: () => Date
}

export interface TabletPassOutcome {
  status: ShardStatus
  result: PassResult
  claims: ObjectSetResult
  pods: ObjectSetResult
}

/**
 * Identifier of a shard in logs and metrics.
 * @example 'commerce/-80'
 */
export function shardId(shard: ShardManifest): string {
  return `${shard.keyspace}/${shard.name}`
}

/**
 * Reference to the resource that owns a shard's tablet objects.
 */
export function shardParentRef(shard: ShardManifest): ParentRef {
  return {
    namespace: shard.namespace,
    name: `${shard.cluster}-${shard.keyspace}-${keyRangeSafeName(shard.keyRange)}`,
    uid: shard.uid,
  }
}

/**
 * Run one reconciliation pass for a shard's tablets.
 * @param signal Deadline of the pass; bounds the topology lookups
 */
export async function reconcileTablets(
  shard: ShardManifest,
  deps: TabletReconcilerDeps,
  signal?: AbortSignal,
): Promise<TabletPassOutcome> {
  const id = shardId(shard)
  const logger = deps.logger.child({ component: 'tablets', shard: id })
  const now = deps.now ?? (() => new Date())
  const endTimer = reconcileDuration.startTimer({ shard: id })

  const results = new ResultBuilder()
  const status = newShardStatus()
  status.observedGeneration = shard.generation
  const deployedCells = new Set<string>()

  const labels = shardTabletLabels(shard)
  const tablets = desiredTablets(shard, labels)

  // Pods and their data volume claims share names, so both sets use the
  // same keys and the same side table.
  const pvcKeys: ObjectKey[] = []
  const podKeys: ObjectKey[] = []
  const tabletMap = new Map<string, TabletSpec>()
  for (const tablet of tablets) {
    const key = { namespace: shard.namespace, name: tabletObjectName(shard.cluster, tablet.alias) }

    if (tablet.dataVolume) {
      tablet.dataVolumePvcName = key.name
      pvcKeys.push(key)
    }
    podKeys.push(key)
    tabletMap.set(objectKeyString(key), tablet)
    deployedCells.add(tablet.alias.cell)

    // Every desired tablet is listed, even if nothing is observed for it.
    status.tablets[tablet.aliasStr] = newTabletStatus(tablet.type, tablet.index)
  }

  const tabletFor = (key: ObjectKey): TabletSpec => {
    const tablet = tabletMap.get(objectKeyString(key))
    if (!tablet) throw new Error(`No desired tablet for ${objectKeyString(key)}`)
    return tablet
  }
  const statusFor = (tablet: TabletSpec) => {
    const tabletStatus = status.tablets[tablet.aliasStr]
    if (!tabletStatus) throw new Error(`No status entry for tablet ${tablet.aliasStr}`)
    return tabletStatus
  }

  const parent = shardParentRef(shard)

  const claimStrategy: Strategy<V1PersistentVolumeClaim> = {
    new: (key) => {
      const tablet = tabletFor(key)
      // A claim that doesn't exist can't be bound.
      statusFor(tablet).dataVolumeBound = 'False'
      return newPvc(key, tablet)
    },
    updateInPlace: (key, pvc) => {
      updatePvcInPlace(pvc, tabletFor(key))
    },
    status: (key, pvc) => {
      statusFor(tabletFor(key)).dataVolumeBound = conditionStatus(pvc.status?.phase === 'Bound')
    },
    prepareForTurndown: (key) => prepareTabletPvcForTurndown(deps.store.pods, key),
  }

  const claims = await reconcileObjectSet(deps.store.claims, parent, pvcKeys, labels, claimStrategy, {
    logger,
  })
  results.merge(objectSetPassResult(claims))

  const podStrategy: Strategy<V1Pod> = {
    new: (key) => {
      const tablet = tabletFor(key)
      // A Pod that doesn't exist can't be running or ready.
      const tabletStatus = statusFor(tablet)
      tabletStatus.running = 'False'
      tabletStatus.ready = 'False'
      tabletStatus.available = 'False'
      return newPod(key, tablet)
    },
    updateInPlace: (key, pod) => {
      updatePodInPlace(pod, tabletFor(key))
      stampObservedGeneration(pod, shard.generation)
    },
    updateRollingRecreate: async (key, pod) => {
      const tablet = tabletFor(key)
      await applyFilesystemResizeAnnotation(deps.store.claims, key.namespace, tablet, logger)
      updatePod(pod, tablet)
    },
    status: (key, pod) => {
      const tabletStatus = statusFor(tabletFor(key))
      tabletStatus.running = conditionStatus(isPodRunning(pod))
      // A terminating Pod is about to lose its capacity.
      if (isPodReady(pod) && !pod.metadata?.deletionTimestamp) {
        tabletStatus.ready = 'True'
        tabletStatus.available = tabletAvailableStatus(pod, results, now())
      } else {
        tabletStatus.ready = 'False'
        tabletStatus.available = 'False'
      }

      const pending = scheduledChanges(pod)
      if (pending) {
        tabletStatus.pendingChanges = pending
      } else {
        delete tabletStatus.pendingChanges
      }

      status.lowestPodGeneration = lowerGenerationMark(
        status.lowestPodGeneration,
        observedShardGeneration(pod),
      )
    },
    recreateStatus: (key, pod) => {
      // Same as a Pod that doesn't exist yet; the next pass creates it.
      const tabletStatus = statusFor(tabletFor(key))
      tabletStatus.running = 'False'
      tabletStatus.ready = 'False'
      tabletStatus.available = 'False'
      const pending = scheduledChanges(pod)
      if (pending) tabletStatus.pendingChanges = pending
    },
    orphanStatus: (key, pod, orphan) => {
      const alias = aliasFromPod(pod)
      status.orphanedTablets[alias ? tabletAliasString(alias) : key.name] = orphan
      // The tablet is kept, so its cell is still in use.
      if (alias) deployedCells.add(alias.cell)
    },
    prepareForTurndown: (_key, pod) =>
      prepareTabletPodForTurndown(pod, {
        topology: deps.topology,
        keyspace: shard.keyspace,
        shard: shard.name,
        tablets: status.tablets,
        topoTimeoutMs: deps.topoTimeoutMs,
        signal,
        logger,
      }),
  }

  const pods = await reconcileObjectSet(deps.store.pods, parent, podKeys, labels, podStrategy, {
    logger,
  })
  results.merge(objectSetPassResult(pods))

  status.cells = [...deployedCells].sort()
  status.lastReconciledAt = now()

  const result = results.result()
  endTimer({ status: result.error ? 'error' : 'success' })
  recordShardStatus(id, status)

  logger.info(
    {
      tablets: tablets.length,
      created: claims.created.length + pods.created.length,
      deleted: claims.deleted.length + pods.deleted.length,
      orphaned: Object.keys(status.orphanedTablets).length,
      requeueAfterMs: result.requeueAfterMs,
      err: result.error,
    },
    'Reconciled tablets',
  )

  return { status, result, claims, pods }
}
