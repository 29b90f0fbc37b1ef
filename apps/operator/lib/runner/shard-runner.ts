/**
 * Shard Runner
 *
 * Repeats reconciliation passes for a fixed set of shards. Each shard has its
 * own self-scheduling setTimeout, so a slow pass for one shard never delays
 * another and passes for the same shard never overlap.
 *
 * The delay before the next pass is, in order of precedence:
 * - the error backoff, when the pass failed
 * - the requeue the pass asked for
 * - the resync interval
 */

import type { ShardManifest } from '@shardwarden/core'
import type { Logger } from '../logger'
import type { PassResult } from '../results/builder'
import { type TabletPassOutcome, shardId } from '../shard'

export type ShardPass = (shard: ShardManifest, signal: AbortSignal) => Promise<TabletPassOutcome>

export interface ShardRunnerOptions {
  pass: ShardPass
  logger: Logger
  reconcileTimeoutMs: number
  resyncIntervalMs: number
  errorBackoffMs: number
}

export interface ShardHealth {
  lastPassAt: Date | null
  lastError: string | null
  nextPassInMs: number | null
}

interface ShardLoop {
  shard: ShardManifest
  timer: ReturnType<typeof setTimeout> | null
  inFlight: Promise<void> | null
  health: ShardHealth
}

export function nextPassDelay(
  result: PassResult,
  options: Pick<ShardRunnerOptions, 'resyncIntervalMs' | 'errorBackoffMs'>,
): number {
  if (result.error) return options.errorBackoffMs
  return result.requeueAfterMs ?? options.resyncIntervalMs
}

export class ShardRunner {
  private loops = new Map<string, ShardLoop>()
  private options: ShardRunnerOptions
  private logger: Logger
  private stopped = false

  constructor(options: ShardRunnerOptions) {
    this.options = options
    this.logger = options.logger.child({ component: 'runner' })
  }

  /**
   * Start a loop for each shard. The first pass runs immediately.
   */
  start(shards: ShardManifest[]): void {
    for (const shard of shards) {
      const id = shardId(shard)
      if (this.loops.has(id)) {
        this.logger.warn({ shard: id }, 'Shard listed twice, ignoring duplicate')
        continue
      }
      const loop: ShardLoop = {
        shard,
        timer: null,
        inFlight: null,
        health: { lastPassAt: null, lastError: null, nextPassInMs: 0 },
      }
      this.loops.set(id, loop)
      this.schedule(loop, 0)
    }
    this.logger.info({ shards: this.loops.size }, 'Shard runner started')
  }

  /**
   * Cancel pending passes and wait for running ones to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true
    const running: Promise<void>[] = []
    for (const loop of this.loops.values()) {
      if (loop.timer) {
        clearTimeout(loop.timer)
        loop.timer = null
      }
      loop.health.nextPassInMs = null
      if (loop.inFlight) running.push(loop.inFlight)
    }
    await Promise.all(running)
    this.logger.info('Shard runner stopped')
  }

  health(): Record<string, ShardHealth> {
    const report: Record<string, ShardHealth> = {}
    for (const [id, loop] of this.loops) {
      report[id] = { ...loop.health }
    }
    return report
  }

  private schedule(loop: ShardLoop, delayMs: number): void {
    if (this.stopped) return
    loop.health.nextPassInMs = delayMs
    loop.timer = setTimeout(() => {
      loop.timer = null
      loop.inFlight = this.runPass(loop).finally(() => {
        loop.inFlight = null
      })
    }, delayMs)
  }

  private async runPass(loop: ShardLoop): Promise<void> {
    const id = shardId(loop.shard)
    let result: PassResult
    try {
      const outcome = await this.options.pass(
        loop.shard,
        AbortSignal.timeout(this.options.reconcileTimeoutMs),
      )
      result = outcome.result
    } catch (err) {
      result = { error: err instanceof Error ? err : new Error(String(err)) }
    }

    loop.health.lastPassAt = new Date()
    loop.health.lastError = result.error?.message ?? null

    const delayMs = nextPassDelay(result, this.options)
    if (result.error) {
      this.logger.error({ shard: id, err: result.error, retryInMs: delayMs }, 'Pass failed')
    } else {
      this.logger.debug({ shard: id, nextPassInMs: delayMs }, 'Pass finished')
    }
    this.schedule(loop, delayMs)
  }
}
