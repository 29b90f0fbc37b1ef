/**
 * Tablet Availability
 *
 * A Ready tablet only counts as available once it has stayed Ready long
 * enough for query routers to notice it.
 */

import type { V1Pod, V1PodCondition } from '@kubernetes/client-node'
import type { ConditionStatus } from '@shardwarden/core'
import type { ResultBuilder } from '../results/builder'

/** How long a Pod must be continuously Ready to be available. */
export const TABLET_AVAILABLE_MS = 30 * 1000

export function podReadyCondition(pod: V1Pod): V1PodCondition | undefined {
  return pod.status?.conditions?.find((condition) => condition.type === 'Ready')
}

export function isPodReady(pod: V1Pod): boolean {
  return podReadyCondition(pod)?.status === 'True'
}

export function isPodRunning(pod: V1Pod): boolean {
  return pod.status?.phase === 'Running'
}

/**
 * Availability of a Ready Pod.
 *
 * Nothing in the Pod changes while the threshold is pending, so no event
 * will trigger another pass. A requeue at the threshold is requested instead.
 */
export function tabletAvailableStatus(
  pod: V1Pod,
  results: ResultBuilder,
  now: Date = new Date(),
): ConditionStatus {
  // Terminating Pods are unavailable even before they turn unready.
  if (pod.metadata?.deletionTimestamp) {
    return 'False'
  }

  const since = podReadyCondition(pod)?.lastTransitionTime
  if (since && now.getTime() - new Date(since).getTime() >= TABLET_AVAILABLE_MS) {
    return 'True'
  }

  results.requeueAfter(TABLET_AVAILABLE_MS)
  return 'False'
}
