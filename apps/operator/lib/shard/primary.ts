/**
 * Primary Lookup
 *
 * Asks the topology service which tablet the global shard record names as
 * primary. The tablet's own view is not consulted, so a tablet that wrongly
 * believes it is primary can still be turned down.
 */

import { type TabletAlias, type TopologyClient, tabletAliasEqual } from '@shardwarden/core'
import { topologyLookupsTotal } from '../metrics'

export type PrimaryCheck =
  | { kind: 'primary' }
  | { kind: 'not-primary' }
  | { kind: 'unknown'; error: Error }

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Topology lookup timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

export interface PrimaryCheckOptions {
  timeoutMs: number

  /** Deadline of the enclosing pass. */
  signal?: AbortSignal
}

/**
 * Check whether `alias` is the shard's primary. Never throws: lookup
 * failures and timeouts come back as `unknown`.
 */
export async function checkTabletPrimary(
  topology: TopologyClient,
  keyspace: string,
  shard: string,
  alias: TabletAlias,
  options: PrimaryCheckOptions,
): Promise<PrimaryCheck> {
  const controller = new AbortController()
  const onParentAbort = () => controller.abort(options.signal?.reason)
  options.signal?.addEventListener('abort', onParentAbort, { once: true })
  if (options.signal?.aborted) controller.abort(options.signal.reason)

  const aborted = new Promise<never>((_resolve, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason)
      return
    }
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true })
  })
  const timer = setTimeout(() => controller.abort(new TimeoutError(options.timeoutMs)), options.timeoutMs)

  let check: PrimaryCheck
  try {
    const record = await Promise.race([topology.getShard(keyspace, shard, controller.signal), aborted])
    check = tabletAliasEqual(record.primaryAlias, alias) ? { kind: 'primary' } : { kind: 'not-primary' }
  } catch (err) {
    check = { kind: 'unknown', error: err instanceof Error ? err : new Error(String(err)) }
  } finally {
    clearTimeout(timer)
    options.signal?.removeEventListener('abort', onParentAbort)
  }

  topologyLookupsTotal.inc({ result: check.kind })
  return check
}
