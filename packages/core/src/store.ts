/**
 * Cluster Object Store Interface
 *
 * Abstracts the cluster API for the object kinds the reconciler manages:
 * - Pods (compute units)
 * - PersistentVolumeClaims (storage units)
 *
 * The object-set reconciler works against a single ObjectClient at a time,
 * so the same engine drives every kind. Implementations:
 * - KubeClusterStore (@shardwarden/kube): @kubernetes/client-node
 * - In-memory fakes in tests
 */

import type { V1ObjectMeta, V1PersistentVolumeClaim, V1Pod } from '@kubernetes/client-node'

/**
 * Namespaced object name.
 * @example { namespace: 'prod', name: 'main-tablet-us-east-2548885007' }
 */
export interface ObjectKey {
  namespace: string
  name: string
}

/**
 * Stable string form of an ObjectKey, used for map keys.
 * @example 'prod/main-tablet-us-east-2548885007'
 */
export function objectKeyString(key: ObjectKey): string {
  return `${key.namespace}/${key.name}`
}

/**
 * Any object carrying standard metadata.
 */
export interface ManagedObject {
  metadata?: V1ObjectMeta
}

/**
 * Key of a live object, or null if its metadata is incomplete.
 */
export function objectKeyOf(obj: ManagedObject): ObjectKey | null {
  const name = obj.metadata?.name
  const namespace = obj.metadata?.namespace
  if (!name || !namespace) return null
  return { namespace, name }
}

/**
 * Client for one object kind.
 */
export interface ObjectClient<T extends ManagedObject> {
  /**
   * Kind name for logging and metrics.
   * @example 'Pod'
   */
  readonly kind: string

  /**
   * Get an object.
   * @returns The object, or null if it does not exist
   */
  get(key: ObjectKey): Promise<T | null>

  /**
   * List objects in a namespace whose labels contain every given pair.
   */
  list(namespace: string, labels: Record<string, string>): Promise<T[]>

  /**
   * Create an object. Rejects with ObjectConflictError if it already exists.
   */
  create(obj: T): Promise<T>

  /**
   * Replace an object. Rejects with ObjectConflictError on a stale resourceVersion.
   */
  update(obj: T): Promise<T>

  /**
   * Delete an object. Deleting a missing object is a no-op.
   */
  delete(key: ObjectKey): Promise<void>
}

/**
 * Clients for every kind the tablet reconciler manages.
 */
export interface ClusterStore {
  readonly name: string
  readonly pods: ObjectClient<V1Pod>
  readonly claims: ObjectClient<V1PersistentVolumeClaim>
}

/**
 * Raised when a create or update races with another writer.
 */
export class ObjectConflictError extends Error {
  readonly status = 409

  constructor(kind: string, key: ObjectKey) {
    super(`${kind} ${objectKeyString(key)} was modified concurrently`)
    this.name = 'ObjectConflictError'
  }
}
