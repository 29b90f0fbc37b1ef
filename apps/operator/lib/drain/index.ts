/**
 * Drain Annotations
 *
 * Draining is performed by an external controller. This side only asks for a
 * drain and polls for completion, both through annotations on the object.
 */

import { DrainFinishedAnnotation, DrainStartedAnnotation, type ManagedObject } from '@shardwarden/core'

/**
 * Whether the drain controller has marked the object as drained.
 */
export function drainFinished(obj: ManagedObject): boolean {
  return obj.metadata?.annotations?.[DrainFinishedAnnotation] !== undefined
}

/**
 * Whether a drain has been requested for the object.
 */
export function drainStarted(obj: ManagedObject): boolean {
  return obj.metadata?.annotations?.[DrainStartedAnnotation] !== undefined
}

/**
 * Request a drain. Does nothing if one was already requested, so the
 * original reason is kept.
 * @returns true if the object was modified
 */
export function startDrain(obj: ManagedObject, reason: string): boolean {
  if (drainStarted(obj)) return false
  obj.metadata = obj.metadata ?? {}
  obj.metadata.annotations = { ...obj.metadata.annotations, [DrainStartedAnnotation]: reason }
  return true
}
