/**
 * Health Controller
 *
 * Liveness check with the pass state of every shard the runner owns.
 */

import { Elysia } from 'elysia'
import type { ShardHealth } from '../../lib/runner'

export interface HealthControllerDeps {
  health: () => Record<string, ShardHealth>
}

export function healthController(deps: HealthControllerDeps) {
  const { health } = deps

  return new Elysia().get('/healthz', () => ({
    status: 'ok',
    shards: health(),
  }))
}
