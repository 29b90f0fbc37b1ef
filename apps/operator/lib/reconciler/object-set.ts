/**
 * Object-Set Reconciler
 *
 * Drives the live objects of one kind toward a desired set of keys:
 * - Desired keys with no live object are created
 * - Desired keys with a live object are updated in place, or marked for a
 *   rolling recreate, and then reported through the status callback
 * - Live objects that are not desired are turned down, unless the strategy
 *   decides to keep them for now
 *
 * Each object is handled independently. A failure is recorded and the rest
 * of the set is still processed.
 */

import type { V1OwnerReference } from '@kubernetes/client-node'
import {
  type ManagedObject,
  type ObjectClient,
  type ObjectKey,
  type OrphanStatus,
  RolloutReleasedAnnotation,
  RolloutScheduledAnnotation,
  newOrphanStatus,
  objectKeyOf,
  objectKeyString,
} from '@shardwarden/core'
import { ObjectOperationError, ReconcileError } from '../errors'
import type { Logger } from '../logger'
import { objectOperationsTotal } from '../metrics'
import type { PassResult } from '../results/builder'
import { isReleased, scheduleChanges, unscheduleChanges } from '../rollout'
import { changedFields, semanticEqual } from '../update/equality'

/** Delay before the pass that recreates an object deleted for a rollout. */
export const RECREATE_REQUEUE_MS = 1000

type MaybePromise<T> = T | Promise<T>

/**
 * Kind-specific callbacks. Every callback is optional.
 */
export interface Strategy<T extends ManagedObject> {
  /** Build a new object for a desired key that has no live object. */
  new?: (key: ObjectKey) => MaybePromise<T>

  /** Mutate fields that can change without a restart. */
  updateInPlace?: (key: ObjectKey, obj: T) => MaybePromise<void>

  /** Mutate fields that need the object to be recreated. */
  updateRollingRecreate?: (key: ObjectKey, obj: T) => MaybePromise<void>

  /** Project a desired object's live state into the parent's status. */
  status?: (key: ObjectKey, obj: T) => MaybePromise<void>

  /**
   * Report a desired object that was just deleted for a rolling recreate.
   * Runs instead of `status`; `obj` is the object as it was before deletion.
   */
  recreateStatus?: (key: ObjectKey, obj: T) => MaybePromise<void>

  /** Record why an undesired object is being kept. */
  orphanStatus?: (key: ObjectKey, obj: T, status: OrphanStatus) => MaybePromise<void>

  /**
   * Decide whether an undesired object may be deleted. Return null to delete
   * it, or the reason it must be kept. Annotation changes made to `obj` are
   * saved when the object is kept.
   */
  prepareForTurndown?: (key: ObjectKey, obj: T) => MaybePromise<OrphanStatus | null>
}

/**
 * The resource that owns the object set.
 */
export interface ParentRef {
  namespace: string
  name: string

  /** When set, created objects get a controller reference to the parent. */
  uid?: string

  /** @example 'Shard' */
  kind?: string

  /** @example 'shardwarden.dev/v1' */
  apiVersion?: string
}

export interface OrphanedObject {
  key: ObjectKey
  status: OrphanStatus
}

export interface ObjectSetResult {
  kind: string
  created: ObjectKey[]
  updated: ObjectKey[]
  deleted: ObjectKey[]
  orphaned: OrphanedObject[]
  errors: Error[]
  requeueAfterMs?: number
}

export interface ReconcileObjectSetOptions {
  logger: Logger
}

/** Orphan reason of undesired objects that already have a deletion timestamp. */
export const TERMINATING_REASON = 'Terminating'

const ROLLOUT_ANNOTATIONS = [RolloutScheduledAnnotation, RolloutReleasedAnnotation]

/**
 * Reconcile one kind of object against a desired key set.
 *
 * Objects are processed one at a time: desired keys first, in the order
 * given, then undesired live objects. Turndown decisions can therefore rely
 * on the status of every desired object from the same call.
 *
 * @param labels Selects the parent's live objects
 */
export async function reconcileObjectSet<T extends ManagedObject>(
  client: ObjectClient<T>,
  parent: ParentRef,
  keys: ObjectKey[],
  labels: Record<string, string>,
  strategy: Strategy<T>,
  options: ReconcileObjectSetOptions,
): Promise<ObjectSetResult> {
  const run = new ObjectSetRun(client, parent, strategy, options.logger)
  return run.reconcile(keys, labels)
}

/**
 * Convert an object-set result to a pass result.
 */
export function objectSetPassResult(result: ObjectSetResult): PassResult {
  const pass: PassResult = {}
  if (result.requeueAfterMs !== undefined) pass.requeueAfterMs = result.requeueAfterMs
  if (result.errors.length > 0) pass.error = new ReconcileError(result.errors)
  return pass
}

/**
 * Whether the object is controlled by a resource other than `parent`.
 */
function controlledByOther(obj: ManagedObject, parent: ParentRef): boolean {
  if (!parent.uid) return false
  const controller = obj.metadata?.ownerReferences?.find((ref) => ref.controller === true)
  return controller !== undefined && controller.uid !== parent.uid
}

function controllerReference(parent: ParentRef & { uid: string }): V1OwnerReference {
  return {
    apiVersion: parent.apiVersion ?? 'shardwarden.dev/v1',
    kind: parent.kind ?? 'Shard',
    name: parent.name,
    uid: parent.uid,
    controller: true,
    blockOwnerDeletion: true,
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

class ObjectSetRun<T extends ManagedObject> {
  private result: ObjectSetResult
  private logger: Logger

  constructor(
    private client: ObjectClient<T>,
    private parent: ParentRef,
    private strategy: Strategy<T>,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'reconciler', kind: client.kind })
    this.result = {
      kind: client.kind,
      created: [],
      updated: [],
      deleted: [],
      orphaned: [],
      errors: [],
    }
  }

  async reconcile(keys: ObjectKey[], labels: Record<string, string>): Promise<ObjectSetResult> {
    let live: T[]
    try {
      live = await this.client.list(this.parent.namespace, labels)
    } catch (err) {
      this.count('list', 'error')
      this.result.errors.push(
        new ObjectOperationError(this.client.kind, this.parent.namespace, 'list', err),
      )
      return this.result
    }

    const liveByKey = new Map<string, { key: ObjectKey; obj: T }>()
    for (const obj of live) {
      const key = objectKeyOf(obj)
      if (!key || controlledByOther(obj, this.parent)) continue
      liveByKey.set(objectKeyString(key), { key, obj })
    }

    const desired = new Set<string>()
    for (const key of keys) {
      const id = objectKeyString(key)
      if (desired.has(id)) continue
      desired.add(id)

      const existing = liveByKey.get(id)
      if (existing) {
        await this.step(key, 'update', () => this.updateObject(key, existing.obj))
      } else {
        await this.step(key, 'create', () => this.createObject(key))
      }
    }

    for (const [id, { key, obj }] of liveByKey) {
      if (desired.has(id)) continue
      if (obj.metadata?.deletionTimestamp) {
        await this.recordTerminating(key, obj)
        continue
      }
      await this.turnDown(key, obj)
    }

    return this.result
  }

  private async step(key: ObjectKey, operation: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (err) {
      this.fail(key, operation, err)
    }
  }

  private fail(key: ObjectKey, operation: string, err: unknown): void {
    const id = objectKeyString(key)
    this.count(operation, 'error')
    this.logger.warn({ key: id, operation, err }, 'Object operation failed')
    this.result.errors.push(new ObjectOperationError(this.client.kind, id, operation, err))
  }

  private count(operation: string, status: 'success' | 'error'): void {
    objectOperationsTotal.inc({ kind: this.client.kind, operation, status })
  }

  private markUpdated(key: ObjectKey): void {
    const id = objectKeyString(key)
    if (!this.result.updated.some((k) => objectKeyString(k) === id)) {
      this.result.updated.push(key)
    }
  }

  private requeueAfter(ms: number): void {
    if (this.result.requeueAfterMs === undefined || ms < this.result.requeueAfterMs) {
      this.result.requeueAfterMs = ms
    }
  }

  private async createObject(key: ObjectKey): Promise<void> {
    if (!this.strategy.new) return

    const obj = await this.strategy.new(key)
    obj.metadata = { ...obj.metadata, namespace: key.namespace, name: key.name }
    const { uid } = this.parent
    if (uid) {
      obj.metadata.ownerReferences = [controllerReference({ ...this.parent, uid })]
    }

    const created = await this.client.create(obj)
    this.count('create', 'success')
    this.result.created.push(key)
    this.logger.info({ key: objectKeyString(key) }, 'Created object')

    await this.strategy.status?.(key, created)
  }

  private async updateObject(key: ObjectKey, live: T): Promise<void> {
    let current = live

    if (this.strategy.updateInPlace) {
      const next = structuredClone(current)
      await this.strategy.updateInPlace(key, next)
      if (!semanticEqual(next, current)) {
        current = await this.save(key, next)
      }
    }

    if (this.strategy.updateRollingRecreate) {
      const next = structuredClone(current)
      await this.strategy.updateRollingRecreate(key, next)
      const changes = changedFields(current, next, ROLLOUT_ANNOTATIONS)

      if (changes.length > 0 && isReleased(current)) {
        await this.client.delete(key)
        this.count('delete', 'success')
        this.result.deleted.push(key)
        this.requeueAfter(RECREATE_REQUEUE_MS)
        this.logger.info({ key: objectKeyString(key), changes }, 'Deleted object for rolling recreate')
        // The deleted object no longer says anything about live state.
        await this.strategy.recreateStatus?.(key, current)
        return
      }

      const marked = structuredClone(current)
      const modified =
        changes.length > 0 ? scheduleChanges(marked, changes.join(', ')) : unscheduleChanges(marked)
      if (modified) {
        current = await this.save(key, marked)
      }
    }

    await this.strategy.status?.(key, current)
  }

  private async save(key: ObjectKey, obj: T): Promise<T> {
    const saved = await this.client.update(obj)
    this.count('update', 'success')
    this.markUpdated(key)
    this.logger.debug({ key: objectKeyString(key) }, 'Updated object')
    return saved
  }

  /**
   * An undesired object the API server is already removing still runs until
   * it is gone, so it is listed like any other kept object.
   */
  private async recordTerminating(key: ObjectKey, live: T): Promise<void> {
    const status = newOrphanStatus(TERMINATING_REASON, 'waiting for the object to finish terminating')
    this.result.orphaned.push({ key, status })
    await this.step(key, 'orphanStatus', async () => {
      await this.strategy.orphanStatus?.(key, live, status)
    })
  }

  /**
   * Delete an undesired object, or record why it is kept. Every undesired
   * object ends up either deleted or with an orphan status.
   */
  private async turnDown(key: ObjectKey, live: T): Promise<void> {
    const id = objectKeyString(key)
    const candidate = structuredClone(live)

    let orphan: OrphanStatus | null
    try {
      orphan = this.strategy.prepareForTurndown
        ? await this.strategy.prepareForTurndown(key, candidate)
        : null
    } catch (err) {
      this.fail(key, 'turndown', err)
      orphan = newOrphanStatus('TurndownCheckFailed', errorMessage(err))
    }

    if (orphan === null) {
      try {
        await this.client.delete(key)
        this.count('delete', 'success')
        this.result.deleted.push(key)
        this.logger.info({ key: id }, 'Deleted undesired object')
        return
      } catch (err) {
        this.fail(key, 'delete', err)
        orphan = newOrphanStatus('DeleteFailed', errorMessage(err))
      }
    }

    let kept = live
    if (!semanticEqual(candidate.metadata?.annotations, live.metadata?.annotations)) {
      try {
        kept = await this.save(key, candidate)
      } catch (err) {
        this.fail(key, 'update', err)
      }
    }

    const status = orphan
    this.result.orphaned.push({ key, status })
    this.logger.info({ key: id, reason: status.reason }, 'Keeping undesired object')
    await this.step(key, 'orphanStatus', async () => {
      await this.strategy.orphanStatus?.(key, kept, status)
    })
  }
}
