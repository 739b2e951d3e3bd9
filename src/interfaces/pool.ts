import type { Readable } from 'node:stream'
import type { UpstreamTarget } from './route'

/**
 * Request sent over a pooled connection
 */
export interface UpstreamRequest {
  method: string
  /** Path and query string */
  path: string
  headers: Record<string, string | string[]>
  body?: Buffer | Readable | null
  signal?: AbortSignal
}

/**
 * Response head and body stream received from an upstream
 */
export interface UpstreamResponse {
  statusCode: number
  headers: Record<string, string | string[] | undefined>
  body: Readable
}

/**
 * One outbound transport connection to an upstream origin
 */
export interface UpstreamTransport {
  request(request: UpstreamRequest): Promise<UpstreamResponse>
  /** Tear the connection down immediately */
  destroy(): Promise<void>
}

/**
 * Factory of transports, one call per new pooled connection
 */
export interface UpstreamConnector {
  connect(target: UpstreamTarget): UpstreamTransport
}

export interface PoolConfig {
  /**
   * Maximum connections per target, idle and in use
   * @default 10
   */
  maxConnections?: number

  /**
   * Idle time after which a connection is discarded on the next acquire
   * @default 60000
   */
  idleTimeout?: number

  /**
   * TCP connect timeout for new connections in milliseconds
   * @default 5000
   */
  connectTimeout?: number

  /**
   * Keep-alive timeout applied by the transport in milliseconds
   * @default 4000
   */
  keepAliveTimeout?: number
}

/**
 * How a request ended for the connection it used
 * Only 'success' returns the connection to the idle set
 */
export type ConnectionOutcome = 'success' | 'failure' | 'aborted'

export interface PooledConnection {
  readonly id: string
  readonly target: UpstreamTarget
  readonly transport: UpstreamTransport
  readonly createdAt: number
  lastUsedAt: number
  inUse: boolean
  requestCount: number
}

export interface TargetPoolStats {
  total: number
  inUse: number
  idle: number
  waiting: number
  created: number
  destroyed: number
}
