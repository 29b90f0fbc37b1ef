import type { V1Pod } from '@kubernetes/client-node'
import { describe, expect, test } from 'vitest'
import { changedFields, semanticEqual } from './equality'

describe('semanticEqual', () => {
  test('ignores undefined fields and empty maps', () => {
    expect(semanticEqual({ a: 1, b: undefined, c: {} }, { a: 1 })).toBe(true)
  })

  test('compares arrays in order', () => {
    expect(semanticEqual(['a', 'b'], ['b', 'a'])).toBe(false)
  })

  test('keeps dates', () => {
    const at = new Date('2026-03-01T12:00:00Z')
    expect(semanticEqual({ at }, { at: new Date(at.getTime()) })).toBe(true)
    expect(semanticEqual({ at }, { at: new Date(at.getTime() + 1) })).toBe(false)
  })
})

describe('changedFields', () => {
  const base: V1Pod = {
    metadata: { name: 'p', labels: { app: 'db' }, annotations: { note: 'x' } },
    spec: { containers: [{ name: 'c', image: 'img:1' }], nodeSelector: { zone: 'a' } },
  }

  test('reports nothing for equal objects', () => {
    expect(changedFields(base, structuredClone(base))).toEqual([])
  })

  test('reports each changed spec field, sorted', () => {
    const desired = structuredClone(base)
    desired.spec = {
      containers: [{ name: 'c', image: 'img:2' }],
      tolerations: [{ key: 'dedicated', operator: 'Exists' }],
    }

    expect(changedFields(base, desired)).toEqual([
      'spec.containers',
      'spec.nodeSelector',
      'spec.tolerations',
    ])
  })

  test('reports label and annotation changes', () => {
    const desired = structuredClone(base)
    desired.metadata = { name: 'p', labels: { app: 'web' }, annotations: { note: 'y' } }

    expect(changedFields(base, desired)).toEqual(['metadata.labels', 'metadata.annotations'])
  })

  test('skips ignored annotations', () => {
    const desired = structuredClone(base)
    desired.metadata = { ...desired.metadata, annotations: { note: 'x', scheduled: 'spec.containers' } }

    expect(changedFields(base, desired, ['scheduled'])).toEqual([])
  })
})
