/**
 * Turndown Safety Policy
 *
 * Gates the deletion of tablets that are no longer desired. The gates run in
 * order and the first one that refuses wins:
 * 1. Draining: the tablet must be drained first
 * 2. PrimaryUnknown / Primary: the tablet must not be the shard primary
 * 3. ShardNotHealthy: every desired tablet must be Ready
 *
 * A refusal keeps the object for another pass. The only side effect is
 * requesting a drain, which is idempotent.
 */

import type { V1Pod } from '@kubernetes/client-node'
import {
  type ObjectClient,
  type ObjectKey,
  type OrphanStatus,
  type TabletStatus,
  type TopologyClient,
  newOrphanStatus,
  tabletAliasString,
} from '@shardwarden/core'
import { drainFinished, startDrain } from '../drain'
import type { Logger } from '../logger'
import { aliasFromPod } from '../tablet/pod'
import { checkTabletPrimary } from './primary'

export const OrphanReason = {
  Draining: 'Draining',
  PrimaryUnknown: 'PrimaryUnknown',
  Primary: 'Primary',
  ShardNotHealthy: 'ShardNotHealthy',
  PodExists: 'PodExists',
} as const

export const TURNDOWN_DRAIN_REASON = 'turning down unwanted tablet'

export interface TabletTurndownContext {
  topology: TopologyClient
  keyspace: string
  shard: string

  /** Status of every desired tablet, already computed in this pass. */
  tablets: Record<string, TabletStatus>

  /** Bound on the primary lookup. */
  topoTimeoutMs: number
  signal?: AbortSignal
  logger: Logger
}

/**
 * Decide whether an undesired tablet Pod may be deleted.
 * May add the drain request annotation to `pod`.
 */
export async function prepareTabletPodForTurndown(
  pod: V1Pod,
  ctx: TabletTurndownContext,
): Promise<OrphanStatus | null> {
  if (!drainFinished(pod)) {
    startDrain(pod, TURNDOWN_DRAIN_REASON)
    return newOrphanStatus(
      OrphanReason.Draining,
      'waiting for the tablet to be drained before turn-down',
    )
  }

  const alias = aliasFromPod(pod)
  if (!alias) {
    return newOrphanStatus(
      OrphanReason.PrimaryUnknown,
      'unable to determine whether this tablet is the primary',
    )
  }

  const check = await checkTabletPrimary(ctx.topology, ctx.keyspace, ctx.shard, alias, {
    timeoutMs: ctx.topoTimeoutMs,
    signal: ctx.signal,
  })
  if (check.kind === 'unknown') {
    ctx.logger.warn(
      { tablet: tabletAliasString(alias), err: check.error },
      'Primary lookup failed, keeping tablet',
    )
    return newOrphanStatus(
      OrphanReason.PrimaryUnknown,
      'unable to determine whether this tablet is the primary',
    )
  }
  if (check.kind === 'primary') {
    return newOrphanStatus(OrphanReason.Primary, 'this tablet is the primary')
  }

  const unhealthy = Object.values(ctx.tablets).some((tablet) => tablet.ready !== 'True')
  if (unhealthy) {
    return newOrphanStatus(
      OrphanReason.ShardNotHealthy,
      'the remaining, desired tablets in the shard are not all healthy',
    )
  }

  return null
}

/**
 * Decide whether an undesired data volume claim may be deleted. The claim is
 * kept while the Pod of the same name exists, or might exist.
 */
export async function prepareTabletPvcForTurndown(
  pods: ObjectClient<V1Pod>,
  key: ObjectKey,
): Promise<OrphanStatus | null> {
  let podExists: boolean
  try {
    podExists = (await pods.get(key)) !== null
  } catch {
    podExists = true
  }

  if (podExists) {
    return newOrphanStatus(
      OrphanReason.PodExists,
      'not deleting tablet PVC because tablet Pod still exists',
    )
  }
  return null
}
