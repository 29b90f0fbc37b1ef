import type { V1Pod } from '@kubernetes/client-node'
import { ObjectConflictError, type ObjectKey } from '@shardwarden/core'
import { describe, expect, test, vi } from 'vitest'
import { type CoreApi, type KindOperations, KubeClusterStore, KubeObjectClient } from './kube-store'

function apiError(code: number): Error {
  return Object.assign(new Error(`HTTP-Code: ${code}`), { code })
}

function pod(name: string): V1Pod {
  return { metadata: { name, namespace: 'prod', labels: { app: 'tablet' } } }
}

function createOps(overrides?: Partial<KindOperations<V1Pod>>): KindOperations<V1Pod> {
  return {
    read: vi.fn(async () => pod('read')),
    list: vi.fn(async () => ({ items: [pod('a'), pod('b')] })),
    create: vi.fn(async (_namespace: string, body: V1Pod) => body),
    replace: vi.fn(async (_key: ObjectKey, body: V1Pod) => body),
    remove: vi.fn(async () => ({})),
    ...overrides,
  }
}

describe('KubeObjectClient', () => {
  test('get returns null on 404', async () => {
    const client = new KubeObjectClient('Pod', createOps({ read: vi.fn(async () => Promise.reject(apiError(404))) }))

    expect(await client.get({ namespace: 'prod', name: 'missing' })).toBeNull()
  })

  test('get rethrows other errors', async () => {
    const client = new KubeObjectClient('Pod', createOps({ read: vi.fn(async () => Promise.reject(apiError(500))) }))

    await expect(client.get({ namespace: 'prod', name: 'x' })).rejects.toThrow('HTTP-Code: 500')
  })

  test('list passes a sorted label selector', async () => {
    const ops = createOps()
    const client = new KubeObjectClient('Pod', ops)

    const items = await client.list('prod', { b: '2', a: '1' })

    expect(items.map((p) => p.metadata?.name)).toEqual(['a', 'b'])
    expect(ops.list).toHaveBeenCalledWith('prod', 'a=1,b=2')
  })

  test('create maps 409 to ObjectConflictError', async () => {
    const client = new KubeObjectClient('Pod', createOps({ create: vi.fn(async () => Promise.reject(apiError(409))) }))

    await expect(client.create(pod('dup'))).rejects.toBeInstanceOf(ObjectConflictError)
  })

  test('update maps 409 to ObjectConflictError', async () => {
    const client = new KubeObjectClient('Pod', createOps({ replace: vi.fn(async () => Promise.reject(apiError(409))) }))

    await expect(client.update(pod('stale'))).rejects.toThrow('Pod prod/stale was modified concurrently')
  })

  test('create rejects objects without a namespace', async () => {
    const client = new KubeObjectClient('Pod', createOps())

    await expect(client.create({ metadata: { name: 'orphan' } })).rejects.toThrow(
      'Pod is missing metadata.name or metadata.namespace',
    )
  })

  test('delete ignores 404', async () => {
    const client = new KubeObjectClient('Pod', createOps({ remove: vi.fn(async () => Promise.reject(apiError(404))) }))

    await expect(client.delete({ namespace: 'prod', name: 'gone' })).resolves.toBeUndefined()
  })

  test('delete rethrows other errors', async () => {
    const client = new KubeObjectClient('Pod', createOps({ remove: vi.fn(async () => Promise.reject(apiError(403))) }))

    await expect(client.delete({ namespace: 'prod', name: 'x' })).rejects.toThrow('HTTP-Code: 403')
  })
})

describe('KubeClusterStore', () => {
  function createApi(): CoreApi {
    return {
      readNamespacedPod: vi.fn(async () => pod('p')),
      listNamespacedPod: vi.fn(async () => ({ items: [pod('p')] })),
      createNamespacedPod: vi.fn(async () => pod('p')),
      replaceNamespacedPod: vi.fn(async () => pod('p')),
      deleteNamespacedPod: vi.fn(async () => pod('p')),
      readNamespacedPersistentVolumeClaim: vi.fn(async () => ({})),
      listNamespacedPersistentVolumeClaim: vi.fn(async () => ({ items: [] })),
      createNamespacedPersistentVolumeClaim: vi.fn(async () => ({})),
      replaceNamespacedPersistentVolumeClaim: vi.fn(async () => ({})),
      deleteNamespacedPersistentVolumeClaim: vi.fn(async () => ({})),
    }
  }

  test('routes pod calls to the pod API', async () => {
    const api = createApi()
    const store = new KubeClusterStore(api)

    await store.pods.list('prod', { app: 'tablet' })
    await store.pods.update(pod('p'))

    expect(api.listNamespacedPod).toHaveBeenCalledWith({ namespace: 'prod', labelSelector: 'app=tablet' })
    expect(api.replaceNamespacedPod).toHaveBeenCalledWith({ namespace: 'prod', name: 'p', body: pod('p') })
  })

  test('routes claim calls to the claim API', async () => {
    const api = createApi()
    const store = new KubeClusterStore(api)

    await store.claims.delete({ namespace: 'prod', name: 'data' })

    expect(api.deleteNamespacedPersistentVolumeClaim).toHaveBeenCalledWith({ namespace: 'prod', name: 'data' })
    expect(store.claims.kind).toBe('PersistentVolumeClaim')
  })
})
