import { describe, expect, test } from 'vitest'
import { findBackupLocation, parseShardManifest, safeParseShardManifest } from './shard'

const MINIMAL = {
  name: '-80',
  namespace: 'prod',
  cluster: 'main',
  keyspace: 'commerce',
  keyRange: { end: '80' },
  images: { tablet: 'registry.local/tablet:1', mysqld: 'registry.local/mysqld:8' },
  tabletPools: [{ cell: 'us-east', type: 'replica', replicas: 2 }],
}

describe('shard manifest schema', () => {
  test('applies defaults', () => {
    const shard = parseShardManifest(MINIMAL)

    expect(shard.generation).toBe(1)
    expect(shard.keyRange).toEqual({ start: '', end: '80' })
    expect(shard.extraFlags).toEqual({})
    expect(shard.backupLocations).toEqual([])

    const pool = shard.tabletPools[0]
    expect(pool.backupLocationName).toBe('')
    expect(pool.tablet).toEqual({ resources: {}, extraFlags: {} })
    expect(pool.tolerations).toEqual([])
    expect(pool.dataVolumeClaimTemplate).toBeUndefined()
  })

  test('defaults the data volume access mode', () => {
    const shard = parseShardManifest({
      ...MINIMAL,
      tabletPools: [
        { cell: 'us-east', type: 'replica', replicas: 1, dataVolumeClaimTemplate: { storage: '10Gi' } },
      ],
    })

    expect(shard.tabletPools[0].dataVolumeClaimTemplate).toEqual({
      accessModes: ['ReadWriteOnce'],
      storage: '10Gi',
    })
  })

  test('rejects a name that does not match the key range', () => {
    const result = safeParseShardManifest({ ...MINIMAL, name: '80-' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.errors).toEqual([
        { path: 'name', message: 'Shard name must match key range "-80"' },
      ])
    }
  })

  test('rejects duplicate pools', () => {
    const result = safeParseShardManifest({
      ...MINIMAL,
      tabletPools: [
        { cell: 'us-east', type: 'replica', replicas: 2 },
        { cell: 'us-east', type: 'replica', replicas: 1 },
      ],
    })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.errors.map((e) => e.path)).toEqual(['tabletPools.1'])
    }
  })

  test('rejects malformed storage quantities', () => {
    const result = safeParseShardManifest({
      ...MINIMAL,
      tabletPools: [
        { cell: 'us-east', type: 'replica', replicas: 1, dataVolumeClaimTemplate: { storage: 'lots' } },
      ],
    })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.errors[0].path).toBe('tabletPools.0.dataVolumeClaimTemplate.storage')
    }
  })

  test('finds backup locations by name', () => {
    const shard = parseShardManifest({
      ...MINIMAL,
      backupLocations: [{ bucket: 'default-bucket' }, { name: 'archive', bucket: 'cold' }],
    })

    expect(findBackupLocation(shard, '')?.bucket).toBe('default-bucket')
    expect(findBackupLocation(shard, 'archive')?.bucket).toBe('cold')
    expect(findBackupLocation(shard, 'missing')).toBeUndefined()
  })
})
