/**
 * Reconciliation Metrics
 *
 * Pass durations, object operations, and the tablet and orphan counts of
 * the last pass per shard.
 */

import type { ShardStatus } from '@shardwarden/core'
import { Counter, Gauge, Histogram } from 'prom-client'
import { registry } from './registry'

// Passes are dominated by API round-trips and the topology lookup
const reconcileBuckets = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60]

export const reconcileDuration = new Histogram({
  name: 'shardwarden_reconcile_duration_seconds',
  help: 'Time to run one reconciliation pass for a shard',
  labelNames: ['shard', 'status'],
  buckets: reconcileBuckets,
  registers: [registry],
})

export const objectOperationsTotal = new Counter({
  name: 'shardwarden_objects_total',
  help: 'Object operations issued by the reconciler',
  labelNames: ['kind', 'operation', 'status'],
  registers: [registry],
})

export const orphanedTablets = new Gauge({
  name: 'shardwarden_orphaned_tablets',
  help: 'Undesired tablets kept in the last pass, by blocking reason',
  labelNames: ['shard', 'reason'],
  registers: [registry],
})

export const tabletsByState = new Gauge({
  name: 'shardwarden_tablets',
  help: 'Desired tablets in the last pass, by state',
  labelNames: ['shard', 'state'],
  registers: [registry],
})

export const topologyLookupsTotal = new Counter({
  name: 'shardwarden_topology_lookup_total',
  help: 'Primary lookups against the topology service, by outcome',
  labelNames: ['result'],
  registers: [registry],
})

/** Reasons last reported per shard, so reasons that went away are reset. */
const orphanReasons = new Map<string, Set<string>>()

/**
 * Publish the tablet and orphan gauges for a shard's status.
 */
export function recordShardStatus(shard: string, status: ShardStatus): void {
  const tablets = Object.values(status.tablets)
  tabletsByState.set({ shard, state: 'desired' }, tablets.length)
  tabletsByState.set({ shard, state: 'running' }, tablets.filter((t) => t.running === 'True').length)
  tabletsByState.set({ shard, state: 'ready' }, tablets.filter((t) => t.ready === 'True').length)
  tabletsByState.set({ shard, state: 'available' }, tablets.filter((t) => t.available === 'True').length)
  tabletsByState.set(
    { shard, state: 'pending_changes' },
    tablets.filter((t) => t.pendingChanges !== undefined && t.pendingChanges !== '').length,
  )

  const counts = new Map<string, number>()
  for (const orphan of Object.values(status.orphanedTablets)) {
    counts.set(orphan.reason, (counts.get(orphan.reason) ?? 0) + 1)
  }

  for (const reason of orphanReasons.get(shard) ?? []) {
    if (!counts.has(reason)) {
      orphanedTablets.remove({ shard, reason })
    }
  }
  for (const [reason, count] of counts) {
    orphanedTablets.set({ shard, reason }, count)
  }
  orphanReasons.set(shard, new Set(counts.keys()))
}
