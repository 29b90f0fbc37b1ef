/**
 * Domain Error Types
 *
 * Custom error classes with status codes. The CLI maps error.status to its
 * exit message and the metrics server to HTTP responses.
 */

import type { ValidationError } from '@shardwarden/core'

export class ShardValidationError extends Error {
  readonly status = 400

  constructor(
    public readonly source: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid shard manifest in ${source}:\n${errorList}`)
    this.name = 'ShardValidationError'
  }
}

/**
 * Aggregate of every per-object failure in a reconciliation pass.
 */
export class ReconcileError extends Error {
  readonly status = 500

  constructor(public readonly errors: Error[]) {
    const first = errors[0]?.message ?? 'unknown error'
    const more = errors.length > 1 ? ` (and ${errors.length - 1} more)` : ''
    super(`${first}${more}`)
    this.name = 'ReconcileError'
  }
}

/**
 * A single object operation failed during a pass.
 */
export class ObjectOperationError extends Error {
  readonly status = 500

  constructor(
    public readonly kind: string,
    public readonly key: string,
    public readonly operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${operation} ${kind} ${key}: ${detail}`, { cause })
    this.name = 'ObjectOperationError'
  }
}

/**
 * Type guard for domain errors with a status code.
 */
export function isDomainError(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number'
}
