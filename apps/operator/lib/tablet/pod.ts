/**
 * Tablet Pod Builder
 *
 * Builds tablet Pods and applies tablet specs to live Pods. Updates only
 * touch the fields the operator manages, so values filled in by the API
 * server or by admission plugins never show up as changes.
 */

import type {
  V1Container,
  V1Pod,
  V1PodSpec,
  V1Toleration,
  V1Volume,
  V1VolumeMount,
} from '@kubernetes/client-node'
import {
  CellLabel,
  type ObjectKey,
  type ResourceRequirements,
  type TabletAlias,
  TabletUidLabel,
  quantitiesEqual,
} from '@shardwarden/core'
import { semanticEqual } from '../update/equality'
import { mergeStringMap } from '../update/maps'
import type { TabletSpec } from './spec'

export const TABLET_CONTAINER_NAME = 'tablet'
export const MYSQLD_CONTAINER_NAME = 'mysqld'
export const DATA_VOLUME_NAME = 'data'
export const DATA_MOUNT_PATH = '/var/lib/mysql'
export const ZONE_NODE_LABEL = 'topology.kubernetes.io/zone'

const WEB_PORT = 15000
const GRPC_PORT = 15999
const MYSQL_PORT = 3306

/**
 * Command-line flags of the tablet process. Extra flags come last, sorted,
 * so the argument list is stable across passes.
 */
export function tabletArgs(tablet: TabletSpec): string[] {
  const flags: Record<string, string> = {
    'tablet-path': tablet.aliasStr,
    'init-keyspace': tablet.keyspace,
    'init-shard': tablet.shard,
    'init-tablet-type': tablet.type,
    port: String(WEB_PORT),
    'grpc-port': String(GRPC_PORT),
  }
  if (tablet.databaseName) {
    flags['init-db-name-override'] = tablet.databaseName
  }
  if (tablet.backupLocation?.bucket) {
    flags['backup-storage-bucket'] = tablet.backupLocation.bucket
  }
  if (tablet.backupLocation?.path) {
    flags['backup-storage-root'] = tablet.backupLocation.path
  }

  const args = Object.entries(flags).map(([key, value]) => `--${key}=${value}`)
  for (const key of Object.keys(tablet.extraFlags).sort()) {
    args.push(`--${key}=${tablet.extraFlags[key]}`)
  }
  return args
}

function dataVolumeMounts(tablet: TabletSpec): V1VolumeMount[] {
  if (!tablet.dataVolumePvcName) return []
  return [{ name: DATA_VOLUME_NAME, mountPath: DATA_MOUNT_PATH }]
}

function desiredContainers(tablet: TabletSpec): V1Container[] {
  return [
    {
      name: TABLET_CONTAINER_NAME,
      image: tablet.images.tablet,
      imagePullPolicy: tablet.imagePullPolicy,
      args: tabletArgs(tablet),
      ports: [
        { name: 'web', containerPort: WEB_PORT, protocol: 'TCP' },
        { name: 'grpc', containerPort: GRPC_PORT, protocol: 'TCP' },
      ],
      resources: { ...tablet.tabletResources },
      volumeMounts: dataVolumeMounts(tablet),
    },
    {
      name: MYSQLD_CONTAINER_NAME,
      image: tablet.images.mysqld,
      imagePullPolicy: tablet.imagePullPolicy,
      ports: [{ name: 'mysql', containerPort: MYSQL_PORT, protocol: 'TCP' }],
      resources: { ...tablet.mysqldResources },
      volumeMounts: dataVolumeMounts(tablet),
    },
  ]
}

function desiredVolumes(tablet: TabletSpec): V1Volume[] {
  if (!tablet.dataVolumePvcName) return []
  return [{ name: DATA_VOLUME_NAME, persistentVolumeClaim: { claimName: tablet.dataVolumePvcName } }]
}

function podLabels(tablet: TabletSpec): Record<string, string> {
  // Extra labels can't override the selector labels.
  return { ...tablet.extraLabels, ...tablet.labels }
}

/**
 * Build a new tablet Pod.
 */
export function newPod(key: ObjectKey, tablet: TabletSpec): V1Pod {
  const spec: V1PodSpec = {
    containers: desiredContainers(tablet),
    volumes: desiredVolumes(tablet),
    affinity: tablet.affinity,
    tolerations: tablet.tolerations.map((toleration) => ({ ...toleration })),
  }
  if (tablet.zone) {
    spec.nodeSelector = { [ZONE_NODE_LABEL]: tablet.zone }
  }

  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      namespace: key.namespace,
      name: key.name,
      labels: podLabels(tablet),
      annotations: { ...tablet.annotations },
    },
    spec,
  }
}

/**
 * Apply the parts of a tablet spec that can change without a restart.
 * Labels and annotations are merged; keys set by others are kept.
 */
export function updatePodInPlace(pod: V1Pod, tablet: TabletSpec): void {
  pod.metadata = pod.metadata ?? {}
  const labels = { ...pod.metadata.labels }
  mergeStringMap(labels, podLabels(tablet))
  pod.metadata.labels = labels

  const annotations = { ...pod.metadata.annotations }
  mergeStringMap(annotations, tablet.annotations)
  pod.metadata.annotations = annotations
}

/**
 * Apply the whole tablet spec, including fields that need the Pod to be
 * recreated to take effect.
 */
export function updatePod(pod: V1Pod, tablet: TabletSpec): void {
  updatePodInPlace(pod, tablet)

  const spec: V1PodSpec = pod.spec ?? { containers: [] }
  pod.spec = spec

  spec.containers = mergeContainers(spec.containers, desiredContainers(tablet))
  spec.volumes = mergeByName(spec.volumes ?? [], desiredVolumes(tablet))
  spec.tolerations = mergeTolerations(spec.tolerations ?? [], tablet.tolerations)
  spec.affinity = tablet.affinity

  if (tablet.zone) {
    spec.nodeSelector = { ...spec.nodeSelector, [ZONE_NODE_LABEL]: tablet.zone }
  } else if (spec.nodeSelector && ZONE_NODE_LABEL in spec.nodeSelector) {
    const { [ZONE_NODE_LABEL]: _zone, ...rest } = spec.nodeSelector
    spec.nodeSelector = rest
  }
}

function mergeContainers(current: V1Container[], desired: V1Container[]): V1Container[] {
  const result = current.map((container) => ({ ...container }))
  for (const want of desired) {
    const have = result.find((container) => container.name === want.name)
    if (!have) {
      result.push(want)
      continue
    }
    have.image = want.image
    if (want.imagePullPolicy) have.imagePullPolicy = want.imagePullPolicy
    have.args = want.args
    if (!resourcesEqual(have.resources, want.resources)) {
      have.resources = want.resources
    }
    have.volumeMounts = mergeByName(have.volumeMounts ?? [], want.volumeMounts ?? [])
  }
  return result
}

/**
 * Replace entries that share a name with a desired entry and append the
 * rest. Entries the operator didn't ask for (such as injected service
 * account mounts) are left alone.
 */
function mergeByName<T extends { name: string }>(current: T[], desired: T[]): T[] {
  const result = [...current]
  for (const want of desired) {
    const index = result.findIndex((item) => item.name === want.name)
    if (index === -1) {
      result.push(want)
    } else if (!semanticEqual(result[index], want)) {
      result[index] = want
    }
  }
  return result
}

function mergeTolerations(current: V1Toleration[], desired: V1Toleration[]): V1Toleration[] {
  const result = [...current]
  for (const want of desired) {
    if (!result.some((have) => semanticEqual(have, want))) {
      result.push({ ...want })
    }
  }
  return result
}

function resourcesEqual(
  a: ResourceRequirements | undefined,
  b: ResourceRequirements | undefined,
): boolean {
  return quantityMapsEqual(a?.requests, b?.requests) && quantityMapsEqual(a?.limits, b?.limits)
}

function quantityMapsEqual(
  a: Record<string, string> | undefined,
  b: Record<string, string> | undefined,
): boolean {
  const left = a ?? {}
  const right = b ?? {}
  const keys = new Set([...Object.keys(left), ...Object.keys(right)])
  for (const key of keys) {
    if (!quantitiesEqual(left[key], right[key])) return false
  }
  return true
}

/**
 * Recover a tablet alias from the labels of a live Pod.
 * @returns null when the labels are missing or malformed
 */
export function aliasFromPod(pod: V1Pod): TabletAlias | null {
  const cell = pod.metadata?.labels?.[CellLabel]
  const uidLabel = pod.metadata?.labels?.[TabletUidLabel]
  if (!cell || !uidLabel || !/^\d+$/.test(uidLabel)) return null
  return { cell, uid: Number.parseInt(uidLabel, 10) }
}
