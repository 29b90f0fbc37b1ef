/**
 * HTTP Topology Client
 *
 * Reads global shard records from the topology service's HTTP API:
 *   GET {baseUrl}/api/shards/{keyspace}/{shard}/
 *
 * The response body is the shard record as JSON. Only `primary_alias` is read.
 */

import { type ShardRecord, type TopologyClient, TopologyLookupError } from '@shardwarden/core'
import { z } from 'zod'

const shardRecordSchema = z.object({
  primary_alias: z
    .object({
      cell: z.string(),
      uid: z.coerce.number().int().min(0),
    })
    .nullish(),
})

export interface HttpTopologyClientConfig {
  /**
   * Base URL of the topology service.
   * @example 'http://topo.prod.svc:15000'
   */
  baseUrl: string

  /**
   * Fetch implementation, for tests.
   */
  fetch?: typeof fetch
}

export class HttpTopologyClient implements TopologyClient {
  readonly name = 'http'
  private baseUrl: string
  private fetchImpl: typeof fetch

  constructor(config: HttpTopologyClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '')
    this.fetchImpl = config.fetch ?? fetch
  }

  async getShard(keyspace: string, shard: string, signal?: AbortSignal): Promise<ShardRecord> {
    const url = `${this.baseUrl}/api/shards/${encodeURIComponent(keyspace)}/${encodeURIComponent(shard)}/`

    let body: unknown
    try {
      const res = await this.fetchImpl(url, { signal, headers: { Accept: 'application/json' } })
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}: ${await res.text()}`)
      }
      body = await res.json()
    } catch (err) {
      throw new TopologyLookupError(keyspace, shard, err)
    }

    const parsed = shardRecordSchema.safeParse(body)
    if (!parsed.success) {
      throw new TopologyLookupError(keyspace, shard, parsed.error)
    }

    const alias = parsed.data.primary_alias
    // A zero UID is how the service reports an unset alias.
    if (!alias || alias.uid === 0) {
      return { primaryAlias: null }
    }
    return { primaryAlias: { cell: alias.cell, uid: alias.uid } }
  }
}
