/**
 * Upstream Connection Pool
 *
 * Keeps, per target origin, a bounded set of reusable outbound connections.
 * A connection is checked out to exactly one request at a time and goes back
 * to the idle set only when that request ended cleanly; any other outcome
 * destroys it.
 *
 * Idle connections past `idleTimeout` are reaped lazily: on the next acquire
 * for their origin, and for every origin at most once per `idleTimeout`.
 * There is no background sweep. An origin left without connections or
 * waiters is forgotten.
 *
 * @example
 * ```ts
 * const pool = new UpstreamPool({ maxConnections: 10 }, new UndiciConnector())
 * const conn = await pool.acquire(target, Date.now() + 1000, signal)
 * try {
 *   const res = await conn.transport.request({ method: 'GET', path: '/', headers: {} })
 *   // ... consume res.body
 *   pool.release(conn, 'success')
 * } catch (error) {
 *   pool.release(conn, 'failure')
 *   throw error
 * }
 * ```
 */
import { PoolClosedError, PoolExhaustedError } from '../errors/gateway-errors'
import type { Logger } from '../interfaces/logger'
import type {
  ConnectionOutcome,
  PoolConfig,
  PooledConnection,
  TargetPoolStats,
  UpstreamConnector,
} from '../interfaces/pool'
import type { UpstreamTarget } from '../interfaces/route'
import { defaultLogger } from '../logger/pino-logger'

export const DEFAULT_POOL_CONFIG: Required<PoolConfig> = {
  maxConnections: 10,
  idleTimeout: 60000,
  connectTimeout: 5000,
  keepAliveTimeout: 4000,
}

interface Waiter {
  target: UpstreamTarget
  resolve: (connection: PooledConnection) => void
  reject: (error: unknown) => void
  cleanup: () => void
}

interface TargetPool {
  /** Most recently used last */
  idle: PooledConnection[]
  inUse: Set<PooledConnection>
  waiters: Waiter[]
  created: number
  destroyed: number
}

export class UpstreamPool {
  private config: Required<PoolConfig>
  private connector: UpstreamConnector
  private pools = new Map<string, TargetPool>()
  private logger: Logger
  private closed = false
  private nextId = 0
  private lastSweep = Date.now()

  constructor(
    config: PoolConfig,
    connector: UpstreamConnector,
    logger?: Logger,
  ) {
    this.config = { ...DEFAULT_POOL_CONFIG, ...config }
    this.connector = connector
    this.logger = logger ?? defaultLogger
  }

  /**
   * Check out a connection to the target
   *
   * Reuses the most recently used idle connection, creates one below the
   * cap, or waits in FIFO order for a release.
   *
   * @param deadline - Epoch milliseconds after which waiting fails
   * @throws PoolExhaustedError when the deadline passes while waiting
   * @throws the abort reason when the signal aborts while waiting
   */
  async acquire(
    target: UpstreamTarget,
    deadline: number,
    signal?: AbortSignal,
  ): Promise<PooledConnection> {
    if (this.closed) {
      throw new PoolClosedError()
    }
    signal?.throwIfAborted()

    const now = Date.now()
    this.sweepIdle(now)
    const pool = this.getPool(target.origin)
    this.reapIdle(pool, now)

    const idle = pool.idle.pop()
    if (idle) {
      return this.checkout(pool, idle, now)
    }

    if (this.total(pool) < this.config.maxConnections) {
      return this.checkout(pool, this.create(pool, target), now)
    }

    const remaining = deadline - now
    if (remaining <= 0) {
      throw new PoolExhaustedError(target.url)
    }

    return new Promise<PooledConnection>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(pool, waiter)
        reject(signal?.reason)
      }
      const timer = setTimeout(() => {
        this.removeWaiter(pool, waiter)
        this.logger.debug('Pool wait deadline elapsed', {
          target: target.origin,
          waiting: pool.waiters.length,
        })
        reject(new PoolExhaustedError(target.url))
      }, remaining)

      const waiter: Waiter = {
        target,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer)
          signal?.removeEventListener('abort', onAbort)
        },
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      pool.waiters.push(waiter)
    })
  }

  /**
   * Return a connection after use
   *
   * Only 'success' keeps the connection. Releasing a connection that is not
   * checked out is ignored.
   */
  release(connection: PooledConnection, outcome: ConnectionOutcome): void {
    if (this.closed) {
      return
    }

    const pool = this.pools.get(connection.target.origin)
    if (!pool || !pool.inUse.has(connection)) {
      this.logger.warn('Ignoring release of a connection not checked out', {
        connection: connection.id,
        outcome,
      })
      return
    }

    pool.inUse.delete(connection)
    connection.inUse = false
    const now = Date.now()
    connection.lastUsedAt = now

    if (outcome === 'success') {
      const waiter = pool.waiters.shift()
      if (waiter) {
        waiter.cleanup()
        waiter.resolve(this.checkout(pool, connection, now))
      } else {
        pool.idle.push(connection)
      }
      return
    }

    this.destroy(pool, connection, outcome)

    const waiter = pool.waiters.shift()
    if (waiter) {
      waiter.cleanup()
      waiter.resolve(
        this.checkout(pool, this.create(pool, waiter.target), now),
      )
    } else {
      this.dropIfEmpty(connection.target.origin, pool)
    }
  }

  /**
   * Connections to the target currently checked out
   */
  inUseCount(target: UpstreamTarget): number {
    return this.pools.get(target.origin)?.inUse.size ?? 0
  }

  getStats(): Record<string, TargetPoolStats> {
    const stats: Record<string, TargetPoolStats> = {}
    for (const [origin, pool] of this.pools) {
      stats[origin] = {
        total: this.total(pool),
        inUse: pool.inUse.size,
        idle: pool.idle.length,
        waiting: pool.waiters.length,
        created: pool.created,
        destroyed: pool.destroyed,
      }
    }
    return stats
  }

  /**
   * Destroy every connection and fail every waiter
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    const pending: Promise<void>[] = []
    for (const pool of this.pools.values()) {
      for (const waiter of pool.waiters.splice(0)) {
        waiter.cleanup()
        waiter.reject(new PoolClosedError())
      }
      for (const connection of [...pool.idle, ...pool.inUse]) {
        pending.push(connection.transport.destroy())
        pool.destroyed++
      }
      pool.idle = []
      pool.inUse.clear()
    }

    const results = await Promise.allSettled(pending)
    const failures = results.filter((result) => result.status === 'rejected')
    this.logger.info('Upstream pool closed', {
      connections: pending.length,
      failedDestroys: failures.length,
    })
  }

  private getPool(origin: string): TargetPool {
    let pool = this.pools.get(origin)
    if (!pool) {
      pool = {
        idle: [],
        inUse: new Set(),
        waiters: [],
        created: 0,
        destroyed: 0,
      }
      this.pools.set(origin, pool)
    }
    return pool
  }

  private total(pool: TargetPool): number {
    return pool.idle.length + pool.inUse.size
  }

  private create(pool: TargetPool, target: UpstreamTarget): PooledConnection {
    const now = Date.now()
    const connection: PooledConnection = {
      id: `${target.origin}#${++this.nextId}`,
      target,
      transport: this.connector.connect(target),
      createdAt: now,
      lastUsedAt: now,
      inUse: false,
      requestCount: 0,
    }
    pool.created++
    this.logger.debug('Upstream connection created', {
      connection: connection.id,
      total: this.total(pool) + 1,
    })
    return connection
  }

  private checkout(
    pool: TargetPool,
    connection: PooledConnection,
    now: number,
  ): PooledConnection {
    connection.inUse = true
    connection.lastUsedAt = now
    connection.requestCount++
    pool.inUse.add(connection)
    return connection
  }

  private reapIdle(pool: TargetPool, now: number): void {
    if (pool.idle.length === 0) return
    const fresh: PooledConnection[] = []
    for (const connection of pool.idle) {
      if (now - connection.lastUsedAt > this.config.idleTimeout) {
        this.destroy(pool, connection, 'idle')
      } else {
        fresh.push(connection)
      }
    }
    pool.idle = fresh
  }

  private destroy(
    pool: TargetPool,
    connection: PooledConnection,
    reason: ConnectionOutcome | 'idle',
  ): void {
    pool.destroyed++
    this.logger.debug('Upstream connection discarded', {
      connection: connection.id,
      reason,
      requests: connection.requestCount,
    })
    connection.transport.destroy().catch((error: unknown) => {
      this.logger.warn('Failed to destroy upstream connection', {
        connection: connection.id,
        error: error instanceof Error ? error.message : String(error),
      })
    })
  }

  private sweepIdle(now: number): void {
    if (now - this.lastSweep < this.config.idleTimeout) return
    this.lastSweep = now
    for (const [origin, pool] of this.pools) {
      this.reapIdle(pool, now)
      this.dropIfEmpty(origin, pool)
    }
  }

  private dropIfEmpty(origin: string, pool: TargetPool): void {
    if (this.total(pool) === 0 && pool.waiters.length === 0) {
      this.pools.delete(origin)
    }
  }

  private removeWaiter(pool: TargetPool, waiter: Waiter): void {
    const index = pool.waiters.indexOf(waiter)
    if (index !== -1) {
      pool.waiters.splice(index, 1)
    }
    waiter.cleanup()
  }
}
