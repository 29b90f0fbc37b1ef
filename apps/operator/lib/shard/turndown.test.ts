import type { V1Pod } from '@kubernetes/client-node'
import {
  DrainFinishedAnnotation,
  DrainStartedAnnotation,
  type TabletStatus,
  newTabletStatus,
} from '@shardwarden/core'
import { describe, expect, test } from 'vitest'
import { FakeClusterStore, FakeTopologyClient } from '../../test/fake-cluster'
import { createBarePod, createShardManifest } from '../../test/fixtures'
import { createSilentLogger } from '../logger'
import { desiredTablets, shardTabletLabels } from '../tablet/desired'
import { newPod } from '../tablet/pod'
import {
  OrphanReason,
  TURNDOWN_DRAIN_REASON,
  type TabletTurndownContext,
  prepareTabletPodForTurndown,
  prepareTabletPvcForTurndown,
} from './turndown'

const key = { namespace: 'prod', name: 'main-tablet-us-east-0228837429' }

function undesiredPod(drained: boolean): V1Pod {
  const shard = createShardManifest()
  const [tablet] = desiredTablets(shard, shardTabletLabels(shard))
  if (!tablet) throw new Error('no tablet compiled')
  const pod = newPod(key, tablet)
  if (drained) {
    pod.metadata = {
      ...pod.metadata,
      annotations: { ...pod.metadata?.annotations, [DrainFinishedAnnotation]: 'true' },
    }
  }
  return pod
}

function readyTablet(index: number): TabletStatus {
  return { ...newTabletStatus('replica', index), ready: 'True' }
}

function context(
  topology: FakeTopologyClient,
  tablets: Record<string, TabletStatus> = { 'us-east-0000000001': readyTablet(1) },
): TabletTurndownContext {
  return {
    topology,
    keyspace: 'commerce',
    shard: '-80',
    tablets,
    topoTimeoutMs: 50,
    logger: createSilentLogger(),
  }
}

describe('prepareTabletPodForTurndown', () => {
  test('starts a drain and refuses before looking up the primary', async () => {
    const topology = new FakeTopologyClient()
    const pod = undesiredPod(false)

    const orphan = await prepareTabletPodForTurndown(pod, context(topology))

    expect(orphan?.reason).toBe(OrphanReason.Draining)
    expect(pod.metadata?.annotations?.[DrainStartedAnnotation]).toBe(TURNDOWN_DRAIN_REASON)
    expect(topology.lookups).toBe(0)
  })

  test('keeps the reason of a drain that was already requested', async () => {
    const pod = undesiredPod(false)
    pod.metadata = {
      ...pod.metadata,
      annotations: { ...pod.metadata?.annotations, [DrainStartedAnnotation]: 'maintenance' },
    }

    const orphan = await prepareTabletPodForTurndown(pod, context(new FakeTopologyClient()))

    expect(orphan?.reason).toBe(OrphanReason.Draining)
    expect(pod.metadata?.annotations?.[DrainStartedAnnotation]).toBe('maintenance')
  })

  test('never releases the primary, even when drained and healthy', async () => {
    const topology = new FakeTopologyClient()
    topology.primaryAlias = { cell: 'us-east', uid: 228837429 }

    const orphan = await prepareTabletPodForTurndown(undesiredPod(true), context(topology))

    expect(orphan).toEqual({ reason: 'Primary', message: 'this tablet is the primary' })
  })

  test('refuses when the primary cannot be determined', async () => {
    const topology = new FakeTopologyClient()
    topology.error = new Error('topology unavailable')

    const orphan = await prepareTabletPodForTurndown(undesiredPod(true), context(topology))

    expect(orphan).toEqual({
      reason: 'PrimaryUnknown',
      message: 'unable to determine whether this tablet is the primary',
    })
  })

  test('refuses when the lookup times out', async () => {
    const topology = new FakeTopologyClient()
    topology.hang = true

    const orphan = await prepareTabletPodForTurndown(undesiredPod(true), context(topology))

    expect(orphan?.reason).toBe(OrphanReason.PrimaryUnknown)
  })

  test('refuses a Pod without tablet labels', async () => {
    const topology = new FakeTopologyClient()
    const pod = createBarePod('stray', {})
    pod.metadata = { ...pod.metadata, annotations: { [DrainFinishedAnnotation]: 'true' } }

    const orphan = await prepareTabletPodForTurndown(pod, context(topology))

    expect(orphan?.reason).toBe(OrphanReason.PrimaryUnknown)
    expect(topology.lookups).toBe(0)
  })

  test('refuses while any desired tablet is not ready', async () => {
    const tablets = {
      'us-east-0000000001': readyTablet(1),
      'us-east-0000000002': { ...newTabletStatus('replica', 2), ready: 'False' as const },
    }

    const orphan = await prepareTabletPodForTurndown(
      undesiredPod(true),
      context(new FakeTopologyClient(), tablets),
    )

    expect(orphan).toEqual({
      reason: 'ShardNotHealthy',
      message: 'the remaining, desired tablets in the shard are not all healthy',
    })
  })

  test('allows turndown once every gate passes', async () => {
    const orphan = await prepareTabletPodForTurndown(undesiredPod(true), context(new FakeTopologyClient()))
    expect(orphan).toBeNull()
  })
})

describe('prepareTabletPvcForTurndown', () => {
  test('keeps the claim while its Pod exists', async () => {
    const store = new FakeClusterStore()
    store.pods.seed(undesiredPod(true))

    expect(await prepareTabletPvcForTurndown(store.pods, key)).toEqual({
      reason: 'PodExists',
      message: 'not deleting tablet PVC because tablet Pod still exists',
    })
  })

  test('keeps the claim when the Pod lookup fails', async () => {
    const store = new FakeClusterStore()
    store.pods.failOn('get', `prod/${key.name}`)

    expect((await prepareTabletPvcForTurndown(store.pods, key))?.reason).toBe('PodExists')
  })

  test('releases the claim once the Pod is gone', async () => {
    const store = new FakeClusterStore()
    expect(await prepareTabletPvcForTurndown(store.pods, key)).toBeNull()
  })
})
