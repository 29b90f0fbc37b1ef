/**
 * Core types for the shardwarden tablet reconciler
 */

// =============================================================================
// Conditions
// =============================================================================

/**
 * Tri-state condition value, matching the Kubernetes convention.
 * - `True`: the condition holds
 * - `False`: the condition does not hold
 * - `Unknown`: nothing has been observed yet
 */
export type ConditionStatus = 'True' | 'False' | 'Unknown'

export function conditionStatus(value: boolean): ConditionStatus {
  return value ? 'True' : 'False'
}

// =============================================================================
// Tablet Identity
// =============================================================================

/**
 * Role of the tablets in a pool.
 * - `replica`: primary-capable replica
 * - `rdonly`: read-only replica used for batch and analytics traffic
 * - `externalmaster`, `externalreplica`, `externalrdonly`: tablets fronting an
 *   externally managed datastore
 */
export type TabletType =
  | 'replica'
  | 'rdonly'
  | 'externalmaster'
  | 'externalreplica'
  | 'externalrdonly'

/**
 * Globally unique tablet address.
 * @example { cell: 'us-east', uid: 2548885007 }
 */
export interface TabletAlias {
  cell: string
  uid: number
}

/**
 * Format an alias as `<cell>-<uid>` with the UID zero-padded to 10 digits.
 * @example 'us-east-2548885007'
 */
export function tabletAliasString(alias: TabletAlias): string {
  return `${alias.cell}-${String(alias.uid).padStart(10, '0')}`
}

export function tabletAliasEqual(a: TabletAlias | null | undefined, b: TabletAlias): boolean {
  return a != null && a.cell === b.cell && a.uid === b.uid
}

// =============================================================================
// Status
// =============================================================================

/**
 * Observed state of one desired tablet.
 */
export interface TabletStatus {
  /** Pool role of the tablet. */
  type: TabletType

  /** 1-based index of the tablet within its pool. */
  index: number

  /** Whether the tablet Pod is in the Running phase. */
  running: ConditionStatus

  /** Whether the tablet Pod reports Ready. */
  ready: ConditionStatus

  /** Whether the tablet has been Ready long enough to receive traffic. */
  available: ConditionStatus

  /** Whether the data volume claim is bound. */
  dataVolumeBound: ConditionStatus

  /**
   * Description of changes waiting for a rolling recreate, if any.
   * @example 'spec.containers'
   */
  pendingChanges?: string
}

export function newTabletStatus(type: TabletType, index: number): TabletStatus {
  return {
    type,
    index,
    running: 'Unknown',
    ready: 'Unknown',
    available: 'Unknown',
    dataVolumeBound: 'Unknown',
  }
}

/**
 * Why an undesired object has not been deleted yet.
 */
export interface OrphanStatus {
  /**
   * Short, stable reason code.
   * @example 'Draining'
   */
  reason: string

  /**
   * Human-readable explanation.
   * @example 'waiting for the tablet to be drained before turn-down'
   */
  message: string
}

export function newOrphanStatus(reason: string, message: string): OrphanStatus {
  return { reason, message }
}

/**
 * Status aggregate written back to the shard after each pass.
 */
export interface ShardStatus {
  /** Cells that contain any desired or retained tablet, sorted. */
  cells: string[]

  /** Desired tablets keyed by alias string. */
  tablets: Record<string, TabletStatus>

  /** Undesired tablets that are being kept, keyed by alias string. */
  orphanedTablets: Record<string, OrphanStatus>

  /**
   * Lowest shard generation observed across all tablet Pods. 0 means unset.
   */
  lowestPodGeneration: number

  /** Manifest generation this status was computed for. */
  observedGeneration: number

  /** When the pass that produced this status finished. */
  lastReconciledAt?: Date
}

export function newShardStatus(): ShardStatus {
  return {
    cells: [],
    tablets: {},
    orphanedTablets: {},
    lowestPodGeneration: 0,
    observedGeneration: 0,
  }
}
