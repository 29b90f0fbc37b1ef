/**
 * Metrics Server
 *
 * Elysia app for Prometheus scraping and liveness checks. The caller picks
 * the adapter and where it listens.
 */

import { Elysia } from 'elysia'
import { isDomainError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import type { ShardHealth } from '../lib/runner'
import { healthController, metricsController } from './routes'

export interface ServerDependencies {
  health: () => Record<string, ShardHealth>
  logger: Logger
}

/**
 * Create the Elysia metrics server
 */
export function createServer(deps: ServerDependencies) {
  const { health } = deps
  const logger = deps.logger.child({ component: 'server' })

  return new Elysia()
    .onError({ as: 'global' }, ({ code, error, path, set }) => {
      if (code === 'NOT_FOUND') {
        set.status = 404
        return { error: 'Not found' }
      }
      if (isDomainError(error)) {
        set.status = error.status
        return { error: error.message }
      }
      logger.error({ err: error, path }, 'Request failed')
      set.status = 500
      return { error: error instanceof Error ? error.message : 'Internal server error' }
    })
    .use(metricsController())
    .use(healthController({ health }))
}
