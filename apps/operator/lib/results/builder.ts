/**
 * Pass Result Builder
 *
 * Collects the outcome of every step in a reconciliation pass. The earliest
 * requested requeue wins; errors are aggregated into a single ReconcileError.
 * Retrying is left to whoever schedules passes.
 */

import { ReconcileError } from '../errors'

export interface PassResult {
  /** Run the next pass no later than this many milliseconds from now. */
  requeueAfterMs?: number

  /** Set when any step failed; the scheduler should retry with backoff. */
  error?: Error
}

export class ResultBuilder {
  private requeueAfterMs: number | undefined
  private errors: Error[] = []

  /**
   * Ask for another pass after `ms`. Keeps the shortest delay requested.
   */
  requeueAfter(ms: number): void {
    if (ms <= 0) return
    if (this.requeueAfterMs === undefined || ms < this.requeueAfterMs) {
      this.requeueAfterMs = ms
    }
  }

  error(err: unknown): void {
    if (err instanceof ReconcileError) {
      this.errors.push(...err.errors)
      return
    }
    this.errors.push(err instanceof Error ? err : new Error(String(err)))
  }

  merge(result: PassResult): void {
    if (result.requeueAfterMs !== undefined) this.requeueAfter(result.requeueAfterMs)
    if (result.error) this.error(result.error)
  }

  result(): PassResult {
    const result: PassResult = {}
    if (this.requeueAfterMs !== undefined) result.requeueAfterMs = this.requeueAfterMs
    if (this.errors.length > 0) result.error = new ReconcileError([...this.errors])
    return result
  }
}
