/**
 * Desired-State Compiler
 *
 * Expands a shard manifest's tablet pools into one TabletSpec per tablet.
 * Pure: the manifest and the label map are never modified.
 */

import {
  CellLabel,
  ClusterLabel,
  ComponentLabel,
  DrainSupportedAnnotation,
  KeyspaceLabel,
  type ShardManifest,
  ShardLabel,
  TabletComponentName,
  TabletIndexLabel,
  TabletTypeLabel,
  TabletUidLabel,
  findBackupLocation,
  keyRangeSafeName,
  keyRangeString,
  tabletAliasString,
} from '@shardwarden/core'
import { mergedStringMaps } from '../update/maps'
import { tabletUid } from './identity'
import type { TabletSpec } from './spec'

/**
 * Labels shared by every tablet object of a shard. Used both to stamp new
 * objects and to select the shard's live objects.
 */
export function shardTabletLabels(shard: ShardManifest): Record<string, string> {
  return {
    [ComponentLabel]: TabletComponentName,
    [ClusterLabel]: shard.cluster,
    [KeyspaceLabel]: shard.keyspace,
    [ShardLabel]: keyRangeSafeName(shard.keyRange),
  }
}

/**
 * Compile the desired tablets of a shard, in pool order then index order.
 */
export function desiredTablets(
  shard: ShardManifest,
  parentLabels: Record<string, string>,
): TabletSpec[] {
  const tablets: TabletSpec[] = []

  for (const pool of shard.tabletPools) {
    const backupLocation = findBackupLocation(shard, pool.backupLocationName)

    // Tablets in a pool get a 1-based index.
    for (let index = 1; index <= pool.replicas; index++) {
      const alias = {
        cell: pool.cell,
        uid: tabletUid(pool.cell, shard.keyspace, shard.keyRange, pool.type, index),
      }

      const labels = {
        ...parentLabels,
        [CellLabel]: alias.cell,
        [TabletUidLabel]: String(alias.uid),
        [TabletTypeLabel]: pool.type,
        [TabletIndexLabel]: String(index),
      }

      const annotations = mergedStringMaps(
        { [DrainSupportedAnnotation]: 'ensure that the tablet is not a primary' },
        pool.annotations,
        backupLocation?.annotations,
      )

      tablets.push({
        alias,
        aliasStr: tabletAliasString(alias),
        index,
        type: pool.type,
        cluster: shard.cluster,
        keyspace: shard.keyspace,
        shard: keyRangeString(shard.keyRange),
        keyRange: { ...shard.keyRange },
        databaseName: shard.databaseName,
        images: { ...shard.images },
        imagePullPolicy: shard.imagePullPolicy,
        zone: shard.zoneMap[alias.cell],
        extraFlags: mergedStringMaps(shard.extraFlags, pool.tablet.extraFlags),
        labels,
        extraLabels: { ...pool.extraLabels },
        annotations,
        tabletResources: pool.tablet.resources,
        mysqldResources: pool.mysqld.resources,
        dataVolume: pool.dataVolumeClaimTemplate,
        backupLocation,
        affinity: pool.affinity,
        tolerations: pool.tolerations,
      })
    }
  }

  return tablets
}
