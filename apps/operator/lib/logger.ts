/**
 * Structured Logger
 *
 * Creates a pino-based logger shared across the operator. Components take a
 * child logger tagged with their name so every line carries `component`.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info', destination?: pino.DestinationStream): Logger {
  return pino({ level, base: { service: 'shardwarden' } }, destination)
}

/**
 * Logger that drops everything, for tests and dry runs.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
