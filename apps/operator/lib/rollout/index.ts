/**
 * Rolling Recreate Annotations
 *
 * Changes that need a Pod restart are not applied directly. The object is
 * marked with the changes it is waiting for, and external rollout logic
 * releases it for deletion when it is that object's turn.
 */

import {
  type ManagedObject,
  RolloutReleasedAnnotation,
  RolloutScheduledAnnotation,
} from '@shardwarden/core'

/**
 * Changes waiting for a rolling recreate, if any.
 * @example 'spec.containers, spec.tolerations'
 */
export function scheduledChanges(obj: ManagedObject): string | undefined {
  return obj.metadata?.annotations?.[RolloutScheduledAnnotation]
}

/**
 * Whether the object has been released for recreation.
 */
export function isReleased(obj: ManagedObject): boolean {
  return obj.metadata?.annotations?.[RolloutReleasedAnnotation] !== undefined
}

/**
 * Mark the object as waiting for `changes`.
 * @returns true if the object was modified
 */
export function scheduleChanges(obj: ManagedObject, changes: string): boolean {
  if (scheduledChanges(obj) === changes) return false
  obj.metadata = obj.metadata ?? {}
  obj.metadata.annotations = { ...obj.metadata.annotations, [RolloutScheduledAnnotation]: changes }
  return true
}

/**
 * Remove both rollout annotations.
 * @returns true if the object was modified
 */
export function unscheduleChanges(obj: ManagedObject): boolean {
  const annotations = obj.metadata?.annotations
  if (!annotations) return false
  if (!(RolloutScheduledAnnotation in annotations) && !(RolloutReleasedAnnotation in annotations)) {
    return false
  }
  const { [RolloutScheduledAnnotation]: _scheduled, [RolloutReleasedAnnotation]: _released, ...rest } =
    annotations
  obj.metadata = { ...obj.metadata, annotations: rest }
  return true
}
