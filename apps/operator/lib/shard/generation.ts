/**
 * Rollout Generation Tracking
 *
 * Every in-place Pod update stamps the shard generation it applied. The
 * lowest stamp across all Pods tells rollout logic whether every Pod has
 * caught up with a given generation.
 */

import type { V1Pod } from '@kubernetes/client-node'
import { ObservedShardGenerationAnnotation } from '@shardwarden/core'

export function stampObservedGeneration(pod: V1Pod, generation: number): void {
  pod.metadata = pod.metadata ?? {}
  pod.metadata.annotations = {
    ...pod.metadata.annotations,
    [ObservedShardGenerationAnnotation]: String(generation),
  }
}

/**
 * Generation stamped on a Pod.
 * @returns null when the annotation is absent or not a non-negative integer
 */
export function observedShardGeneration(pod: V1Pod): number | null {
  const value = pod.metadata?.annotations?.[ObservedShardGenerationAnnotation]
  if (!value || !/^\d+$/.test(value)) return null
  const generation = Number.parseInt(value, 10)
  return Number.isSafeInteger(generation) ? generation : null
}

/**
 * Fold one observation into the low-water mark. 0 means unset.
 */
export function lowerGenerationMark(current: number, observed: number | null): number {
  if (observed === null) return current
  if (current === 0 || observed < current) return observed
  return current
}
