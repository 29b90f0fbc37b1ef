function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key]
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue
}

export interface OperatorConfig {
  logLevel: string

  /** Deadline for one reconciliation pass. */
  reconcileTimeoutMs: number

  /** Deadline for one topology lookup; a fraction of the pass deadline. */
  topoTimeoutMs: number

  /** Base URL of the topology service HTTP API. */
  topoUrl: string

  /** Delay between passes when a pass asks for no earlier requeue. */
  resyncIntervalMs: number

  /** Delay before retrying a pass that failed. */
  errorBackoffMs: number

  metricsHost: string
  metricsPort: number
}

export function loadConfig(): OperatorConfig {
  const reconcileTimeoutMs = getEnvNumber('SHARDWARDEN_RECONCILE_TIMEOUT_MS', 60 * 1000)

  return {
    logLevel: getEnvString('SHARDWARDEN_LOG_LEVEL', 'info'),
    reconcileTimeoutMs,
    topoTimeoutMs: getEnvNumber('SHARDWARDEN_TOPO_TIMEOUT_MS', Math.floor(reconcileTimeoutMs / 6)),
    topoUrl: getEnvString('SHARDWARDEN_TOPO_URL', 'http://localhost:15000'),
    resyncIntervalMs: getEnvNumber('SHARDWARDEN_RESYNC_INTERVAL_MS', 60 * 1000),
    errorBackoffMs: getEnvNumber('SHARDWARDEN_ERROR_BACKOFF_MS', 5 * 1000),
    metricsHost: getEnvString('SHARDWARDEN_METRICS_HOST', '0.0.0.0'),
    metricsPort: getEnvNumber('SHARDWARDEN_METRICS_PORT', 9090),
  }
}

export const config: OperatorConfig = loadConfig()
