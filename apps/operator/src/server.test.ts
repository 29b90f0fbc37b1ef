import pino from 'pino'
import { describe, expect, test } from 'vitest'
import { createServer } from './server'

const silentLogger = pino({ level: 'silent' })

function createTestServer() {
  return createServer({
    logger: silentLogger,
    health: () => ({
      'commerce/-80': { lastPassAt: null, lastError: null, nextPassInMs: 0 },
    }),
  })
}

describe('metrics server', () => {
  test('GET /metrics serves the registry', async () => {
    const res = await createTestServer().handle(new Request('http://localhost/metrics'))
    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toContain('text/plain')
    expect(await res.text()).toContain('shardwarden_build_info')
  })

  test('GET /healthz reports every shard', async () => {
    const res = await createTestServer().handle(new Request('http://localhost/healthz'))
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      status: 'ok',
      shards: { 'commerce/-80': { lastPassAt: null, lastError: null, nextPassInMs: 0 } },
    })
  })

  test('unknown paths return 404', async () => {
    const res = await createTestServer().handle(new Request('http://localhost/nope'))
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Not found' })
  })

  test('routes only answer GET', async () => {
    const res = await createTestServer().handle(
      new Request('http://localhost/metrics', { method: 'POST' }),
    )
    expect(res.status).toBe(404)
  })
})
