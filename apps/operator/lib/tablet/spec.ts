import type { V1Affinity, V1Toleration } from '@kubernetes/client-node'
import type {
  BackupLocation,
  DataVolumeClaimTemplate,
  KeyRange,
  ResourceRequirements,
  TabletAlias,
  TabletType,
} from '@shardwarden/core'

/**
 * Fully resolved configuration of one tablet.
 * Built by the desired-state compiler and read by the Pod and PVC builders.
 */
export interface TabletSpec {
  alias: TabletAlias

  /** @example 'us-east-2548885007' */
  aliasStr: string

  /** 1-based index within the pool */
  index: number
  type: TabletType

  cluster: string
  keyspace: string
  shard: string
  keyRange: KeyRange
  databaseName?: string

  images: { tablet: string; mysqld: string }
  imagePullPolicy?: string

  /** Availability zone of the tablet's cell, if mapped */
  zone?: string

  /** Global flags overlaid with the pool's flags */
  extraFlags: Record<string, string>

  /** Labels stamped on the Pod and PVC, also used as the tablet's selector */
  labels: Record<string, string>
  extraLabels: Record<string, string>
  annotations: Record<string, string>

  tabletResources: ResourceRequirements
  mysqldResources: ResourceRequirements

  /** Absent for tablets without local storage */
  dataVolume?: DataVolumeClaimTemplate

  /** Set once the object name is known; same as the Pod name */
  dataVolumePvcName?: string

  backupLocation?: BackupLocation
  affinity?: V1Affinity
  tolerations: V1Toleration[]
}
