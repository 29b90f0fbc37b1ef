/**
 * Metrics Controller
 *
 * Prometheus scrape endpoint.
 */

import { Elysia } from 'elysia'
import { registry } from '../../lib/metrics'

export const metricsController = () =>
  new Elysia({ prefix: '' }).get('/metrics', async () => {
    const metrics = await registry.metrics()
    return new Response(metrics, {
      headers: { 'Content-Type': registry.contentType },
    })
  })
