import { describe, expect, test } from 'vitest'
import { FakeTopologyClient } from '../../test/fake-cluster'
import { checkTabletPrimary } from './primary'

const alias = { cell: 'us-east', uid: 228837429 }

describe('checkTabletPrimary', () => {
  test('matches the alias in the global shard record', async () => {
    const topology = new FakeTopologyClient()
    topology.primaryAlias = { cell: 'us-east', uid: 228837429 }

    expect(await checkTabletPrimary(topology, 'commerce', '-80', alias, { timeoutMs: 1000 })).toEqual({
      kind: 'primary',
    })
  })

  test('is not-primary when another tablet or nobody is primary', async () => {
    const topology = new FakeTopologyClient()

    topology.primaryAlias = { cell: 'us-west', uid: 228837429 }
    const other = await checkTabletPrimary(topology, 'commerce', '-80', alias, { timeoutMs: 1000 })
    topology.primaryAlias = null
    const none = await checkTabletPrimary(topology, 'commerce', '-80', alias, { timeoutMs: 1000 })

    expect(other).toEqual({ kind: 'not-primary' })
    expect(none).toEqual({ kind: 'not-primary' })
  })

  test('lookup failures are unknown', async () => {
    const topology = new FakeTopologyClient()
    topology.error = new Error('connection refused')

    const check = await checkTabletPrimary(topology, 'commerce', '-80', alias, { timeoutMs: 1000 })

    expect(check.kind).toBe('unknown')
    expect(check.kind === 'unknown' && check.error.message).toBe('connection refused')
  })

  test('a lookup that outlives the timeout is unknown', async () => {
    const topology = new FakeTopologyClient()
    topology.hang = true

    const check = await checkTabletPrimary(topology, 'commerce', '-80', alias, { timeoutMs: 20 })

    expect(check.kind === 'unknown' && check.error.message).toBe('Topology lookup timed out after 20ms')
  })

  test('an aborted pass makes the lookup unknown', async () => {
    const topology = new FakeTopologyClient()
    topology.hang = true
    const controller = new AbortController()
    controller.abort(new Error('pass deadline exceeded'))

    const check = await checkTabletPrimary(topology, 'commerce', '-80', alias, {
      timeoutMs: 1000,
      signal: controller.signal,
    })

    expect(check.kind === 'unknown' && check.error.message).toBe('pass deadline exceeded')
  })
})
