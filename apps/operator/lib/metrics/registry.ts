/**
 * Metric Registry
 *
 * The operator's own prom-client registry. The domain metrics in
 * `reconcile.ts` register here; `/metrics` serves it.
 */

import { Gauge, Registry, collectDefaultMetrics } from 'prom-client'

export const OPERATOR_VERSION = '0.1.0'

export const registry = new Registry()

// Includes process_start_time_seconds, so uptime needs no gauge of its own.
collectDefaultMetrics({ register: registry })

/** Always 1; the labels identify the running build. */
export const buildInfo = new Gauge({
  name: 'shardwarden_build_info',
  help: 'Operator build, labelled by operator and Node.js version',
  labelNames: ['version', 'node_version'],
  registers: [registry],
})
buildInfo.set({ version: OPERATOR_VERSION, node_version: process.versions.node }, 1)
