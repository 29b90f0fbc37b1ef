/**
 * Kubernetes Cluster Store
 *
 * Implements ClusterStore using @kubernetes/client-node.
 */

import {
  CoreV1Api,
  KubeConfig,
  type V1PersistentVolumeClaim,
  type V1Pod,
} from '@kubernetes/client-node'
import {
  type ClusterStore,
  type ManagedObject,
  type ObjectClient,
  ObjectConflictError,
  type ObjectKey,
  labelSelector,
  objectKeyOf,
} from '@shardwarden/core'

/**
 * The subset of CoreV1Api the store calls.
 */
export type CoreApi = Pick<
  CoreV1Api,
  | 'readNamespacedPod'
  | 'listNamespacedPod'
  | 'createNamespacedPod'
  | 'replaceNamespacedPod'
  | 'deleteNamespacedPod'
  | 'readNamespacedPersistentVolumeClaim'
  | 'listNamespacedPersistentVolumeClaim'
  | 'createNamespacedPersistentVolumeClaim'
  | 'replaceNamespacedPersistentVolumeClaim'
  | 'deleteNamespacedPersistentVolumeClaim'
>

export interface KubeClusterStoreConfig {
  /**
   * Path to a kubeconfig file. When unset, the default loading rules apply
   * (KUBECONFIG, ~/.kube/config, then in-cluster service account).
   * @example '/home/user/.kube/config'
   */
  kubeconfigPath?: string

  /**
   * Context to use from the kubeconfig.
   * @example 'staging'
   */
  context?: string
}

/**
 * Per-kind API calls.
 */
export interface KindOperations<T> {
  read(key: ObjectKey): Promise<T>
  list(namespace: string, selector: string): Promise<{ items: T[] }>
  create(namespace: string, body: T): Promise<T>
  replace(key: ObjectKey, body: T): Promise<T>
  remove(key: ObjectKey): Promise<unknown>
}

/**
 * HTTP status code of a client error, if it carries one.
 */
export function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('code' in err && typeof err.code === 'number') return err.code
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode
  return undefined
}

export class KubeObjectClient<T extends ManagedObject> implements ObjectClient<T> {
  readonly kind: string
  private ops: KindOperations<T>

  constructor(kind: string, ops: KindOperations<T>) {
    this.kind = kind
    this.ops = ops
  }

  async get(key: ObjectKey): Promise<T | null> {
    try {
      return await this.ops.read(key)
    } catch (err) {
      if (statusCodeOf(err) === 404) {
        return null
      }
      throw err
    }
  }

  async list(namespace: string, labels: Record<string, string>): Promise<T[]> {
    const result = await this.ops.list(namespace, labelSelector(labels))
    return result.items
  }

  async create(obj: T): Promise<T> {
    const key = this.requireKey(obj)
    try {
      return await this.ops.create(key.namespace, obj)
    } catch (err) {
      if (statusCodeOf(err) === 409) {
        throw new ObjectConflictError(this.kind, key)
      }
      throw err
    }
  }

  async update(obj: T): Promise<T> {
    const key = this.requireKey(obj)
    try {
      return await this.ops.replace(key, obj)
    } catch (err) {
      if (statusCodeOf(err) === 409) {
        throw new ObjectConflictError(this.kind, key)
      }
      throw err
    }
  }

  async delete(key: ObjectKey): Promise<void> {
    try {
      await this.ops.remove(key)
    } catch (err) {
      if (statusCodeOf(err) !== 404) {
        throw err
      }
    }
  }

  private requireKey(obj: T): ObjectKey {
    const key = objectKeyOf(obj)
    if (!key) {
      throw new Error(`${this.kind} is missing metadata.name or metadata.namespace`)
    }
    return key
  }
}

export class KubeClusterStore implements ClusterStore {
  readonly name = 'kubernetes'
  readonly pods: ObjectClient<V1Pod>
  readonly claims: ObjectClient<V1PersistentVolumeClaim>

  constructor(api: CoreApi) {
    this.pods = new KubeObjectClient<V1Pod>('Pod', {
      read: ({ namespace, name }) => api.readNamespacedPod({ namespace, name }),
      list: (namespace, selector) => api.listNamespacedPod({ namespace, labelSelector: selector }),
      create: (namespace, body) => api.createNamespacedPod({ namespace, body }),
      replace: ({ namespace, name }, body) => api.replaceNamespacedPod({ namespace, name, body }),
      remove: ({ namespace, name }) => api.deleteNamespacedPod({ namespace, name }),
    })

    this.claims = new KubeObjectClient<V1PersistentVolumeClaim>('PersistentVolumeClaim', {
      read: ({ namespace, name }) => api.readNamespacedPersistentVolumeClaim({ namespace, name }),
      list: (namespace, selector) =>
        api.listNamespacedPersistentVolumeClaim({ namespace, labelSelector: selector }),
      create: (namespace, body) => api.createNamespacedPersistentVolumeClaim({ namespace, body }),
      replace: ({ namespace, name }, body) =>
        api.replaceNamespacedPersistentVolumeClaim({ namespace, name, body }),
      remove: ({ namespace, name }) =>
        api.deleteNamespacedPersistentVolumeClaim({ namespace, name }),
    })
  }

  /**
   * Build a store from kubeconfig.
   */
  static fromConfig(config?: KubeClusterStoreConfig): KubeClusterStore {
    const kc = new KubeConfig()
    if (config?.kubeconfigPath) {
      kc.loadFromFile(config.kubeconfigPath)
    } else {
      kc.loadFromDefault()
    }
    if (config?.context) {
      kc.setCurrentContext(config.context)
    }
    return new KubeClusterStore(kc.makeApiClient(CoreV1Api))
  }
}
