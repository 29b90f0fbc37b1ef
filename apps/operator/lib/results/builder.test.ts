import { describe, expect, test } from 'vitest'
import { ReconcileError } from '../errors'
import { ResultBuilder } from './builder'

describe('ResultBuilder', () => {
  test('empty builder reports success with no requeue', () => {
    expect(new ResultBuilder().result()).toEqual({})
  })

  test('keeps the shortest requeue', () => {
    const builder = new ResultBuilder()
    builder.requeueAfter(30_000)
    builder.requeueAfter(5_000)
    builder.requeueAfter(60_000)
    builder.requeueAfter(0)

    expect(builder.result()).toEqual({ requeueAfterMs: 5_000 })
  })

  test('aggregates errors and flattens nested aggregates', () => {
    const builder = new ResultBuilder()
    builder.error(new Error('create failed'))
    builder.error(new ReconcileError([new Error('delete failed'), new Error('update failed')]))
    builder.error('plain string')

    const { error } = builder.result()

    expect(error).toBeInstanceOf(ReconcileError)
    if (error instanceof ReconcileError) {
      expect(error.errors.map((e) => e.message)).toEqual([
        'create failed',
        'delete failed',
        'update failed',
        'plain string',
      ])
      expect(error.message).toBe('create failed (and 3 more)')
    }
  })

  test('merges other results', () => {
    const builder = new ResultBuilder()
    builder.merge({ requeueAfterMs: 1_000 })
    builder.merge({ error: new Error('boom') })

    const result = builder.result()
    expect(result.requeueAfterMs).toBe(1_000)
    expect(result.error?.message).toBe('boom')
  })
})
