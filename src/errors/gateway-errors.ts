/**
 * Gateway error taxonomy
 *
 * Every failure the forwarding engine can observe is one of these classes.
 * The engine recovers all of them at its boundary: `statusCode` is what the
 * client receives when nothing has been written yet, and `expose` tells
 * whether a response may be written at all.
 */

export type GatewayErrorCode =
  | 'NO_ROUTE'
  | 'POOL_EXHAUSTED'
  | 'POOL_CLOSED'
  | 'ADMISSION_REJECTED'
  | 'UPSTREAM_UNREACHABLE'
  | 'UPSTREAM_TIMEOUT'
  | 'CLIENT_DISCONNECTED'
  | 'PARTIAL_RESPONSE'
  | 'INVALID_CONFIG'
  | 'INTERNAL_ERROR'

export class GatewayError extends Error {
  readonly code: GatewayErrorCode
  readonly statusCode: number
  /** Whether an error response may still be written to the client */
  readonly expose: boolean

  constructor(
    code: GatewayErrorCode,
    statusCode: number,
    message: string,
    options?: { cause?: unknown; expose?: boolean },
  ) {
    super(
      message,
      options?.cause === undefined ? undefined : { cause: options.cause },
    )
    this.name = new.target.name
    this.code = code
    this.statusCode = statusCode
    this.expose = options?.expose ?? true
  }
}

export class NoRouteError extends GatewayError {
  constructor(host: string, path: string) {
    super('NO_ROUTE', 404, `No route matches ${host}${path}`)
  }
}

export class PoolExhaustedError extends GatewayError {
  constructor(readonly target: string) {
    super('POOL_EXHAUSTED', 503, `Connection pool exhausted for ${target}`)
  }
}

export class PoolClosedError extends GatewayError {
  constructor() {
    super('POOL_CLOSED', 503, 'Connection pool is closed')
  }
}

export class AdmissionRejectedError extends GatewayError {
  constructor(
    readonly scope: string,
    reason: 'queue-full' | 'deadline',
  ) {
    super(
      'ADMISSION_REJECTED',
      503,
      reason === 'queue-full'
        ? `Admission queue full for ${scope}`
        : `Admission wait expired for ${scope}`,
    )
  }
}

export class UpstreamUnreachableError extends GatewayError {
  constructor(
    readonly target: string,
    cause?: unknown,
  ) {
    super(
      'UPSTREAM_UNREACHABLE',
      502,
      `Upstream ${target} unreachable${cause instanceof Error ? `: ${cause.message}` : ''}`,
      { cause },
    )
  }
}

export class UpstreamTimeoutError extends GatewayError {
  constructor(timeoutMs: number) {
    super(
      'UPSTREAM_TIMEOUT',
      504,
      `Request deadline of ${timeoutMs}ms exceeded`,
    )
  }
}

export class ClientDisconnectedError extends GatewayError {
  constructor() {
    super('CLIENT_DISCONNECTED', 499, 'Client closed the connection', {
      expose: false,
    })
  }
}

export class PartialResponseFailureError extends GatewayError {
  constructor(
    readonly target: string,
    cause?: unknown,
  ) {
    super(
      'PARTIAL_RESPONSE',
      502,
      `Upstream ${target} failed after the response started`,
      { cause, expose: false },
    )
  }
}

export class ConfigError extends GatewayError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(
      'INVALID_CONFIG',
      500,
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
    )
  }
}

/**
 * Wraps anything thrown into a GatewayError, keeping known gateway errors as is
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new GatewayError('INTERNAL_ERROR', 500, message, { cause: error })
}
