import { describe, expect, test } from 'vitest'
import { createPoolInput, createShardManifest } from '../../test/fixtures'
import { desiredTablets, shardTabletLabels } from './desired'
import { newPvc, updatePvcInPlace } from './pvc'
import type { TabletSpec } from './spec'

const key = { namespace: 'prod', name: 'main-tablet-us-east-0228837429' }

function compileTablet(storage?: string): TabletSpec {
  const shard = createShardManifest({
    tabletPools: [
      createPoolInput({
        dataVolumeClaimTemplate: storage ? { storage, storageClassName: 'ssd' } : undefined,
      }),
    ],
  })
  const [tablet] = desiredTablets(shard, shardTabletLabels(shard))
  if (!tablet) throw new Error('no tablet compiled')
  return tablet
}

describe('newPvc', () => {
  test('builds the claim from the data volume template', () => {
    const pvc = newPvc(key, compileTablet('10Gi'))

    expect(pvc.metadata?.name).toBe(key.name)
    expect(pvc.metadata?.labels?.['shardwarden.dev/tablet-index']).toBe('1')
    expect(pvc.spec).toEqual({
      accessModes: ['ReadWriteOnce'],
      storageClassName: 'ssd',
      resources: { requests: { storage: '10Gi' } },
    })
  })

  test('refuses tablets without a data volume', () => {
    expect(() => newPvc(key, compileTablet())).toThrow(
      'Tablet us-east-0228837429 has no data volume template',
    )
  })
})

describe('updatePvcInPlace', () => {
  test('grows the storage request', () => {
    const pvc = newPvc(key, compileTablet('10Gi'))

    updatePvcInPlace(pvc, compileTablet('20Gi'))

    expect(pvc.spec?.resources?.requests).toEqual({ storage: '20Gi' })
  })

  test('ignores requests to shrink', () => {
    const pvc = newPvc(key, compileTablet('20Gi'))

    updatePvcInPlace(pvc, compileTablet('10240Mi'))

    expect(pvc.spec?.resources?.requests).toEqual({ storage: '20Gi' })
  })

  test('keeps labels set by others', () => {
    const pvc = newPvc(key, compileTablet('10Gi'))
    pvc.metadata = { ...pvc.metadata, labels: { ...pvc.metadata?.labels, 'backup.io/policy': 'daily' } }

    updatePvcInPlace(pvc, compileTablet('10Gi'))

    expect(pvc.metadata?.labels?.['backup.io/policy']).toBe('daily')
    expect(pvc.metadata?.labels?.['shardwarden.dev/cell']).toBe('us-east')
  })
})
