/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions for creating test data across all tests.
 */

import type { V1PersistentVolumeClaim, V1Pod } from '@kubernetes/client-node'
import {
  type ShardManifest,
  type ShardManifestInput,
  parseShardManifest,
} from '@shardwarden/core'
import { faker } from '@faker-js/faker'

type PoolInput = NonNullable<ShardManifestInput['tabletPools']>[number]

// =============================================================================
// Shard Fixtures
// =============================================================================

export function createPoolInput(overrides?: Partial<PoolInput>): PoolInput {
  return {
    cell: 'us-east',
    type: 'replica',
    replicas: 2,
    dataVolumeClaimTemplate: { storage: '10Gi' },
    ...overrides,
  }
}

/**
 * A validated shard manifest. The name and key range are fixed so tests can
 * rely on stable tablet UIDs; everything incidental is random.
 */
export function createShardManifest(overrides?: Partial<ShardManifestInput>): ShardManifest {
  return parseShardManifest({
    name: '-80',
    namespace: 'prod',
    cluster: 'main',
    keyspace: 'commerce',
    uid: faker.string.uuid(),
    generation: 1,
    keyRange: { start: '', end: '80' },
    images: {
      tablet: `registry.local/tablet:v${faker.system.semver()}`,
      mysqld: `registry.local/mysqld:${faker.helpers.arrayElement(['8.0', '8.4'])}`,
    },
    tabletPools: [createPoolInput()],
    ...overrides,
  })
}

// =============================================================================
// Live Object Fixtures
// =============================================================================

/**
 * Mark a Pod as running and Ready since `readySince`.
 */
export function markPodReady(pod: V1Pod, readySince: Date): V1Pod {
  pod.status = {
    phase: 'Running',
    conditions: [{ type: 'Ready', status: 'True', lastTransitionTime: readySince }],
  }
  return pod
}

export function markPvcBound(pvc: V1PersistentVolumeClaim): V1PersistentVolumeClaim {
  pvc.status = { phase: 'Bound' }
  return pvc
}

/**
 * Pod with only the metadata the reconciler looks at.
 */
export function createBarePod(name: string, labels: Record<string, string>): V1Pod {
  return {
    metadata: { namespace: 'prod', name, labels: { ...labels } },
    spec: { containers: [{ name: 'app', image: `registry.local/${faker.internet.domainWord()}:1` }] },
  }
}
