/**
 * Topology Service Interface
 *
 * Read-only view of the global shard records kept by the lock service.
 * Only the primary alias is needed to decide whether a tablet may be
 * turned down.
 */

import type { TabletAlias } from './types'

/**
 * Global record for one shard.
 */
export interface ShardRecord {
  /**
   * Alias of the tablet the shard record names as primary, or null when the
   * shard has no primary.
   */
  primaryAlias: TabletAlias | null
}

export interface TopologyClient {
  /**
   * Client name for logging.
   * @example 'http'
   */
  readonly name: string

  /**
   * Read the global shard record.
   * @param keyspace Keyspace name
   * @param shard Shard name, e.g. '-80'
   * @param signal Aborts the lookup when the caller's deadline passes
   */
  getShard(keyspace: string, shard: string, signal?: AbortSignal): Promise<ShardRecord>
}

/**
 * Raised when the topology service cannot answer.
 */
export class TopologyLookupError extends Error {
  readonly status = 503

  constructor(keyspace: string, shard: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to read shard ${keyspace}/${shard}: ${detail}`, { cause })
    this.name = 'TopologyLookupError'
  }
}
