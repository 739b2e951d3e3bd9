/**
 * Tests for the per-target upstream connection pool
 */
import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  PoolClosedError,
  PoolExhaustedError,
} from '../../src/errors/gateway-errors'
import type {
  UpstreamConnector,
  UpstreamTransport,
} from '../../src/interfaces/pool'
import type { UpstreamTarget } from '../../src/interfaces/route'
import { UpstreamPool } from '../../src/pool/upstream-pool'
import { silentLogger, target } from '../helpers'

class FakeConnector implements UpstreamConnector {
  connected: string[] = []
  destroyed = 0

  connect(upstream: UpstreamTarget): UpstreamTransport {
    this.connected.push(upstream.origin)
    return {
      request: () => Promise.reject(new Error('not used in pool tests')),
      destroy: async () => {
        this.destroyed++
      },
    }
  }
}

describe('UpstreamPool', () => {
  const a = target('http://a.test:3000')
  const b = target('http://b.test:3000')
  let connector: FakeConnector
  let pool: UpstreamPool

  beforeEach(() => {
    vi.useFakeTimers()
    connector = new FakeConnector()
    pool = new UpstreamPool(
      { maxConnections: 2, idleTimeout: 1000 },
      connector,
      silentLogger,
    )
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  const deadline = (ms = 500) => Date.now() + ms

  test('reuses a released connection', async () => {
    const first = await pool.acquire(a, deadline())
    pool.release(first, 'success')

    const second = await pool.acquire(a, deadline())
    expect(second).toBe(first)
    expect(second.requestCount).toBe(2)
    expect(connector.connected).toEqual(['http://a.test:3000'])
  })

  test('keeps a separate pool per origin', async () => {
    await pool.acquire(a, deadline())
    await pool.acquire(b, deadline())
    expect(pool.inUseCount(a)).toBe(1)
    expect(pool.inUseCount(b)).toBe(1)
    expect(Object.keys(pool.getStats())).toEqual([
      'http://a.test:3000',
      'http://b.test:3000',
    ])
  })

  test('a third acquire with cap 2 waits and proceeds on release', async () => {
    const first = await pool.acquire(a, deadline())
    await pool.acquire(a, deadline())

    let third: unknown = null
    const waiting = pool.acquire(a, deadline()).then((conn) => {
      third = conn
      return conn
    })
    await vi.advanceTimersByTimeAsync(10)
    expect(third).toBeNull()
    expect(pool.getStats()['http://a.test:3000']?.waiting).toBe(1)

    pool.release(first, 'success')
    expect(await waiting).toBe(first)
    expect(pool.inUseCount(a)).toBe(2)
    expect(connector.connected).toHaveLength(2)
  })

  test('fails with PoolExhaustedError when the deadline passes', async () => {
    await pool.acquire(a, deadline())
    await pool.acquire(a, deadline())

    const assertion = expect(pool.acquire(a, deadline(200))).rejects.toThrow(
      PoolExhaustedError,
    )
    await vi.advanceTimersByTimeAsync(200)
    await assertion
    expect(pool.getStats()['http://a.test:3000']?.waiting).toBe(0)
  })

  test('fails at once when the deadline already passed', async () => {
    await pool.acquire(a, deadline())
    await pool.acquire(a, deadline())
    await expect(pool.acquire(a, Date.now())).rejects.toThrow(
      'Connection pool exhausted for http://a.test:3000',
    )
  })

  test('a failed connection is destroyed and replaced for the next waiter', async () => {
    const first = await pool.acquire(a, deadline())
    await pool.acquire(a, deadline())
    const waiting = pool.acquire(a, deadline())

    pool.release(first, 'failure')
    const replacement = await waiting

    expect(replacement).not.toBe(first)
    expect(connector.destroyed).toBe(1)
    expect(connector.connected).toHaveLength(3)
    expect(pool.getStats()['http://a.test:3000']).toMatchObject({
      total: 2,
      inUse: 2,
      destroyed: 1,
    })
  })

  test('an aborted waiter leaves the queue with the abort reason', async () => {
    await pool.acquire(a, deadline())
    await pool.acquire(a, deadline())

    const controller = new AbortController()
    const assertion = expect(
      pool.acquire(a, deadline(), controller.signal),
    ).rejects.toThrow('client went away')
    controller.abort(new Error('client went away'))
    await assertion
    expect(pool.getStats()['http://a.test:3000']?.waiting).toBe(0)
  })

  test('reaps idle connections past the idle timeout', async () => {
    const first = await pool.acquire(a, deadline())
    pool.release(first, 'success')

    await vi.advanceTimersByTimeAsync(1001)
    const next = await pool.acquire(a, deadline())

    expect(next).not.toBe(first)
    expect(connector.destroyed).toBe(1)
  })

  test('forgets an origin once its last connection is gone', async () => {
    const conn = await pool.acquire(a, deadline())
    pool.release(conn, 'failure')
    expect(pool.getStats()).toEqual({})
    expect(pool.inUseCount(a)).toBe(0)
  })

  test('sweeps idle connections of every origin', async () => {
    for (let port = 40000; port < 40010; port++) {
      const conn = await pool.acquire(
        target(`http://svc.test:${port}`),
        deadline(),
      )
      pool.release(conn, 'success')
    }
    expect(Object.keys(pool.getStats())).toHaveLength(10)

    await vi.advanceTimersByTimeAsync(1001)
    await pool.acquire(a, deadline())

    expect(Object.keys(pool.getStats())).toEqual(['http://a.test:3000'])
    expect(connector.destroyed).toBe(10)
  })

  test('never exceeds the cap', async () => {
    const held = await Promise.all([
      pool.acquire(a, deadline()),
      pool.acquire(a, deadline()),
    ])
    const pending = [
      pool.acquire(a, deadline()),
      pool.acquire(a, deadline()),
      pool.acquire(a, deadline()),
    ]

    for (const conn of held) {
      pool.release(conn, 'success')
    }
    const granted = await Promise.all(pending.slice(0, 2))
    expect(pool.inUseCount(a)).toBe(2)

    for (const conn of granted) {
      pool.release(conn, 'aborted')
    }
    await pending[2]
    expect(pool.inUseCount(a)).toBe(1)
    expect(pool.getStats()['http://a.test:3000']?.total).toBe(1)
  })

  test('ignores a release of a connection that is not checked out', async () => {
    const conn = await pool.acquire(a, deadline())
    pool.release(conn, 'success')
    pool.release(conn, 'success')
    expect(pool.getStats()['http://a.test:3000']).toMatchObject({
      idle: 1,
      inUse: 0,
    })
  })

  test('close fails waiters and later acquires', async () => {
    await pool.acquire(a, deadline())
    await pool.acquire(a, deadline())
    const assertion = expect(pool.acquire(a, deadline())).rejects.toThrow(
      PoolClosedError,
    )

    await pool.close()
    await assertion
    expect(connector.destroyed).toBe(2)
    await expect(pool.acquire(a, deadline())).rejects.toThrow(PoolClosedError)
  })
})
