/**
 * Tablet Data Volume Claim Builder
 */

import type { V1PersistentVolumeClaim } from '@kubernetes/client-node'
import { type ObjectKey, parseQuantity } from '@shardwarden/core'
import { mergeStringMap } from '../update/maps'
import type { TabletSpec } from './spec'

/**
 * Build the data volume claim of a tablet.
 * Must only be called for tablets that have a data volume template.
 */
export function newPvc(key: ObjectKey, tablet: TabletSpec): V1PersistentVolumeClaim {
  if (!tablet.dataVolume) {
    throw new Error(`Tablet ${tablet.aliasStr} has no data volume template`)
  }

  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      namespace: key.namespace,
      name: key.name,
      labels: { ...tablet.extraLabels, ...tablet.labels },
    },
    spec: {
      accessModes: [...tablet.dataVolume.accessModes],
      storageClassName: tablet.dataVolume.storageClassName,
      resources: { requests: { storage: tablet.dataVolume.storage } },
    },
  }
}

/**
 * Apply label changes and storage growth to a live claim.
 * Requests to shrink the volume are ignored since they can't be applied.
 */
export function updatePvcInPlace(pvc: V1PersistentVolumeClaim, tablet: TabletSpec): void {
  pvc.metadata = pvc.metadata ?? {}
  const labels = { ...pvc.metadata.labels }
  mergeStringMap(labels, { ...tablet.extraLabels, ...tablet.labels })
  pvc.metadata.labels = labels

  const wanted = tablet.dataVolume?.storage
  if (!wanted || !pvc.spec) return

  const current = pvc.spec.resources?.requests?.storage
  const currentBytes = current === undefined ? null : parseQuantity(current)
  const wantedBytes = parseQuantity(wanted)
  if (wantedBytes === null) return

  if (currentBytes === null || wantedBytes > currentBytes) {
    pvc.spec.resources = {
      ...pvc.spec.resources,
      requests: { ...pvc.spec.resources?.requests, storage: wanted },
    }
  }
}
