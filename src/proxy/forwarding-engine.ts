/**
 * Forwarding Engine
 *
 * Runs one inbound request from route resolution to the last relayed byte:
 *
 * 1. Resolve the route (route table, then host-pattern router)
 * 2. Start the request deadline and watch for the client going away
 * 3. Take a global then a route admission slot
 * 4. Prepare the body: buffered bodies can be replayed, streamed ones only
 *    while unread
 * 5. Walk the attempt plan: circuit permit, pooled connection, send
 * 6. Relay status, headers and body with backpressure
 * 7. Release connection, slots and timers, then emit the outcome event
 *
 * Every failure is recovered here. `handle` never rejects.
 *
 * @example
 * ```ts
 * const engine = new ForwardingEngine({ routeTable, admission, pool, tracker, balancer })
 * http.createServer((req, res) => {
 *   void engine.handle(req, res)
 * })
 * ```
 */
import type { IncomingMessage, ServerResponse } from 'node:http'
import { pipeline } from 'node:stream/promises'
import type {
  AdmissionController,
  AdmissionSlot,
} from '../admission/admission-controller'
import { ErrorResponder } from '../errors/error-responder'
import {
  ClientDisconnectedError,
  GatewayError,
  NoRouteError,
  PartialResponseFailureError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
  toGatewayError,
} from '../errors/gateway-errors'
import type { CircuitTracker } from '../health/circuit-tracker'
import type {
  ForwardingConfig,
  GatewayHooks,
  RequestOutcomeEvent,
  RequestOutcomeKind,
} from '../interfaces/forwarding'
import type { CircuitPermit } from '../interfaces/health'
import type { Logger } from '../interfaces/logger'
import type { PooledConnection, UpstreamResponse } from '../interfaces/pool'
import type { Route, UpstreamTarget } from '../interfaces/route'
import type { HttpLoadBalancer } from '../load-balancer/http-load-balancer'
import { defaultLogger } from '../logger/pino-logger'
import type { UpstreamPool } from '../pool/upstream-pool'
import type { HostPatternRouter } from '../routing/host-pattern'
import type { RouteTable } from '../routing/route-table'
import {
  buildUpstreamHeaders,
  resolveRequestId,
  rewritePath,
  stripHopByHop,
} from './headers'
import { LazyRequestBody } from './request-body'

export const DEFAULT_FORWARDING_CONFIG: Required<ForwardingConfig> = {
  maxBufferedBodyBytes: 64 * 1024,
  failureStatusCodes: [502, 503, 504],
}

export interface ForwardingEngineOptions {
  routeTable: RouteTable
  admission: AdmissionController
  pool: UpstreamPool
  tracker: CircuitTracker
  balancer: HttpLoadBalancer
  hostRouter?: HostPatternRouter | null
  responder?: ErrorResponder
  forwarding?: ForwardingConfig
  hooks?: GatewayHooks
  logger?: Logger
}

type RequestBody =
  | { kind: 'none' }
  | { kind: 'buffered'; data: Buffer }
  | { kind: 'stream'; stream: IncomingMessage }

type AttemptResult =
  | { kind: 'done'; status: number }
  | { kind: 'failed'; error: GatewayError }

interface AttemptInput {
  route: Route
  target: UpstreamTarget
  permit: CircuitPermit
  body: RequestBody
  signal: AbortSignal
}

interface MatchedRoute {
  route: Route
  candidates: readonly UpstreamTarget[]
  degraded: boolean
}

/**
 * State of one request for its whole lifetime
 */
interface InFlightRequest {
  readonly requestId: string
  readonly method: string
  readonly host: string
  readonly path: string
  readonly startedAt: number
  route: Route | null
  target: UpstreamTarget | null
  deadline: number
  slots: AdmissionSlot[]
  attempts: number
  responseStarted: boolean
  signal: AbortSignal | null
  cleanup: (() => void)[]
}

const OUTCOME_BY_CODE: Partial<
  Record<GatewayError['code'], RequestOutcomeKind>
> = {
  NO_ROUTE: 'no-route',
  ADMISSION_REJECTED: 'rejected',
  POOL_EXHAUSTED: 'pool-exhausted',
  POOL_CLOSED: 'pool-exhausted',
  UPSTREAM_UNREACHABLE: 'unreachable',
  UPSTREAM_TIMEOUT: 'timeout',
  CLIENT_DISCONNECTED: 'client-disconnected',
  PARTIAL_RESPONSE: 'partial-response',
}

function hasBody(req: IncomingMessage): boolean {
  if (req.headers['transfer-encoding'] !== undefined) return true
  const length = Number(req.headers['content-length'] ?? 0)
  return Number.isFinite(length) && length > 0
}

/**
 * Reads a whole request body, giving up when the signal aborts
 */
function readBody(req: IncomingMessage, signal: AbortSignal): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    const onData = (chunk: Buffer) => {
      chunks.push(chunk)
    }
    const onEnd = () => {
      cleanup()
      resolve(Buffer.concat(chunks))
    }
    const onError = (error: Error) => {
      cleanup()
      reject(error)
    }
    const onAbort = () => {
      cleanup()
      reject(signal.reason)
    }
    const cleanup = () => {
      req.off('data', onData)
      req.off('end', onEnd)
      req.off('error', onError)
      signal.removeEventListener('abort', onAbort)
    }

    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    req.on('data', onData)
    req.once('end', onEnd)
    req.once('error', onError)
    signal.addEventListener('abort', onAbort, { once: true })
  })
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class ForwardingEngine {
  private readonly routeTable: RouteTable
  private readonly admission: AdmissionController
  private readonly pool: UpstreamPool
  private readonly tracker: CircuitTracker
  private readonly balancer: HttpLoadBalancer
  private hostRouter: HostPatternRouter | null
  private responder: ErrorResponder
  private config: Required<ForwardingConfig>
  private failureStatusCodes: ReadonlySet<number>
  private hooks: GatewayHooks
  private logger: Logger
  private active = new Set<InFlightRequest>()
  private idleWaiters: (() => void)[] = []

  constructor(options: ForwardingEngineOptions) {
    this.routeTable = options.routeTable
    this.admission = options.admission
    this.pool = options.pool
    this.tracker = options.tracker
    this.balancer = options.balancer
    this.hostRouter = options.hostRouter ?? null
    this.responder = options.responder ?? new ErrorResponder()
    this.config = { ...DEFAULT_FORWARDING_CONFIG, ...options.forwarding }
    this.failureStatusCodes = new Set(this.config.failureStatusCodes)
    this.hooks = options.hooks ?? {}
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Swap the settings a reload may change; requests in flight keep the ones
   * they started with where it matters (route, deadline)
   */
  configure(options: {
    hostRouter?: HostPatternRouter | null
    responder?: ErrorResponder
    forwarding?: ForwardingConfig
    hooks?: GatewayHooks
  }): void {
    if (options.hostRouter !== undefined) this.hostRouter = options.hostRouter
    if (options.responder) this.responder = options.responder
    if (options.forwarding) {
      this.config = { ...DEFAULT_FORWARDING_CONFIG, ...options.forwarding }
      this.failureStatusCodes = new Set(this.config.failureStatusCodes)
    }
    if (options.hooks) this.hooks = options.hooks
  }

  /**
   * Requests currently being handled
   */
  get inFlight(): number {
    return this.active.size
  }

  /**
   * Resolves once no request is in flight
   */
  whenIdle(): Promise<void> {
    if (this.active.size === 0) return Promise.resolve()
    return new Promise((resolve) => this.idleWaiters.push(resolve))
  }

  /**
   * Forward one request; never rejects
   */
  async handle(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<RequestOutcomeEvent> {
    const ctx: InFlightRequest = {
      requestId: resolveRequestId(req.headers['x-request-id']),
      method: req.method ?? 'GET',
      host: req.headers.host ?? '',
      path: req.url ?? '/',
      startedAt: Date.now(),
      route: null,
      target: null,
      deadline: 0,
      slots: [],
      attempts: 0,
      responseStarted: false,
      signal: null,
      cleanup: [],
    }
    this.active.add(ctx)

    let status: number
    let outcome: RequestOutcomeKind
    let failure: GatewayError | undefined

    try {
      status = await this.forward(ctx, req, res)
      outcome = 'success'
    } catch (error) {
      failure = this.classify(error, ctx.signal)
      outcome = OUTCOME_BY_CODE[failure.code] ?? 'error'
      status = failure.statusCode
      this.fail(ctx, res, failure)
    } finally {
      this.finish(ctx)
    }

    const event: RequestOutcomeEvent = {
      requestId: ctx.requestId,
      method: ctx.method,
      path: ctx.path,
      host: ctx.host,
      routeId: ctx.route?.id ?? null,
      target: ctx.target?.url ?? null,
      status,
      outcome,
      latencyMs: Date.now() - ctx.startedAt,
      retries: Math.max(0, ctx.attempts - 1),
      attempts: ctx.attempts,
      ...(failure
        ? { error: { code: failure.code, message: failure.message } }
        : {}),
    }
    this.emit(event)
    return event
  }

  private resolveRoute(host: string, path: string): MatchedRoute | null {
    const resolution = this.routeTable.resolve(host, path, (target) =>
      this.tracker.isEligible(target),
    )
    if (resolution.kind === 'matched') {
      return resolution
    }

    const route = this.hostRouter?.resolve(host)
    if (!route) return null
    const eligible = route.targets.filter((target) =>
      this.tracker.isEligible(target),
    )
    return eligible.length > 0
      ? { route, candidates: eligible, degraded: false }
      : { route, candidates: route.targets, degraded: true }
  }

  private async forward(
    ctx: InFlightRequest,
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<number> {
    const match = this.resolveRoute(ctx.host, ctx.path)
    if (!match) {
      throw new NoRouteError(ctx.host, ctx.path)
    }
    const { route } = match
    ctx.route = route
    ctx.deadline = ctx.startedAt + route.policy.timeout

    const controller = new AbortController()
    const signal = controller.signal
    ctx.signal = signal
    const timer = setTimeout(
      () => controller.abort(new UpstreamTimeoutError(route.policy.timeout)),
      route.policy.timeout,
    )
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort(new ClientDisconnectedError())
      }
    }
    res.once('close', onClose)
    ctx.cleanup.push(() => {
      clearTimeout(timer)
      res.off('close', onClose)
    })

    ctx.slots.push(
      await this.admission.acquire({ kind: 'global' }, ctx.deadline, signal),
    )
    ctx.slots.push(
      await this.admission.acquire(
        {
          kind: 'route',
          routeId: route.id,
          limit: route.policy.maxConcurrency,
        },
        ctx.deadline,
        signal,
      ),
    )

    const body = await this.prepareBody(req, signal)
    const plan = this.balancer.plan(route, match.candidates, match.degraded)

    let lastFailure: GatewayError | null = null
    for (const target of plan.targets) {
      signal.throwIfAborted()
      if (ctx.attempts > 0 && !this.isReplayable(body)) {
        this.logger.debug('Streamed body already consumed, not retrying', {
          requestId: ctx.requestId,
          route: route.id,
        })
        break
      }

      const permit = this.tracker.tryAcquire(target, match.degraded)
      if (!permit) continue

      ctx.attempts++
      ctx.target = target
      const result = await this.attempt(ctx, req, res, {
        route,
        target,
        permit,
        body,
        signal,
      })
      if (result.kind === 'done') {
        return result.status
      }
      lastFailure = result.error
    }

    signal.throwIfAborted()
    throw (
      lastFailure ??
      new UpstreamUnreachableError(
        route.id,
        new Error('no target accepted the request'),
      )
    )
  }

  private async prepareBody(
    req: IncomingMessage,
    signal: AbortSignal,
  ): Promise<RequestBody> {
    if (!hasBody(req)) {
      return { kind: 'none' }
    }

    const length = Number(req.headers['content-length'])
    if (
      req.headers['transfer-encoding'] === undefined &&
      Number.isFinite(length) &&
      length <= this.config.maxBufferedBodyBytes
    ) {
      return { kind: 'buffered', data: await readBody(req, signal) }
    }

    return { kind: 'stream', stream: req }
  }

  private isReplayable(body: RequestBody): boolean {
    if (body.kind !== 'stream') return true
    return !body.stream.readableDidRead && !body.stream.destroyed
  }

  /**
   * One attempt against one target; only pre-response transport failures
   * come back as 'failed', everything else ends the request
   */
  private async attempt(
    ctx: InFlightRequest,
    req: IncomingMessage,
    res: ServerResponse,
    { route, target, permit, body, signal }: AttemptInput,
  ): Promise<AttemptResult> {
    const acquireStart = Date.now()
    let connection: PooledConnection
    try {
      connection = await this.pool.acquire(target, ctx.deadline, signal)
    } catch (error) {
      this.tracker.releasePermit(target, permit)
      throw error
    }
    this.logger.logMetrics('pool', 'acquire', Date.now() - acquireStart, {
      requestId: ctx.requestId,
      target: target.origin,
    })

    const attemptStart = Date.now()
    let response: UpstreamResponse
    try {
      response = await connection.transport.request({
        method: ctx.method,
        path: rewritePath(route, target, ctx.path),
        headers: buildUpstreamHeaders(req, route, target, ctx.requestId),
        body:
          body.kind === 'buffered'
            ? body.data
            : body.kind === 'stream'
              ? new LazyRequestBody(body.stream)
              : null,
        signal,
      })
    } catch (error) {
      if (signal.aborted) {
        this.pool.release(connection, 'aborted')
        this.settleAborted(target, permit, signal.reason)
        throw signal.reason
      }

      this.pool.release(connection, 'failure')
      const failure = new UpstreamUnreachableError(target.url, error)
      this.tracker.recordFailure(target, permit, failure)
      this.logger.warn('Upstream attempt failed', {
        requestId: ctx.requestId,
        route: route.id,
        target: target.url,
        attempt: ctx.attempts,
        error: describe(error),
      })
      return { kind: 'failed', error: failure }
    }

    this.logger.logMetrics('upstream', 'headers', Date.now() - attemptStart, {
      requestId: ctx.requestId,
      target: target.origin,
      status: response.statusCode,
      attempt: ctx.attempts,
    })

    try {
      res.writeHead(response.statusCode, stripHopByHop(response.headers))
    } catch (error) {
      // malformed upstream head, nothing reached the client yet
      response.body.destroy()
      this.pool.release(connection, 'failure')
      const failure = new UpstreamUnreachableError(target.url, error)
      this.tracker.recordFailure(target, permit, failure)
      throw failure
    }
    ctx.responseStarted = true

    try {
      await pipeline(response.body, res, { signal })
    } catch (error) {
      if (signal.reason instanceof ClientDisconnectedError) {
        this.pool.release(connection, 'aborted')
        this.tracker.releasePermit(target, permit)
        throw signal.reason
      }

      this.pool.release(connection, 'failure')
      const failure = new PartialResponseFailureError(
        target.url,
        signal.aborted ? signal.reason : error,
      )
      this.tracker.recordFailure(target, permit, failure)
      throw failure
    }

    this.pool.release(connection, 'success')
    if (this.failureStatusCodes.has(response.statusCode)) {
      this.tracker.recordFailure(
        target,
        permit,
        new Error(`Upstream responded ${response.statusCode}`),
      )
    } else {
      this.tracker.recordSuccess(target, permit, Date.now() - attemptStart)
    }
    return { kind: 'done', status: response.statusCode }
  }

  /**
   * A deadline is the upstream's fault, a client leaving is nobody's
   */
  private settleAborted(
    target: UpstreamTarget,
    permit: CircuitPermit,
    reason: unknown,
  ): void {
    if (reason instanceof UpstreamTimeoutError) {
      this.tracker.recordFailure(target, permit, reason)
    } else {
      this.tracker.releasePermit(target, permit)
    }
  }

  private classify(error: unknown, signal: AbortSignal | null): GatewayError {
    if (error instanceof GatewayError) return error
    if (signal?.aborted && signal.reason instanceof GatewayError) {
      return signal.reason
    }
    return toGatewayError(error)
  }

  private fail(
    ctx: InFlightRequest,
    res: ServerResponse,
    failure: GatewayError,
  ): void {
    if (failure.code === 'INTERNAL_ERROR') {
      this.logger.error('Unexpected forwarding error', failure, {
        requestId: ctx.requestId,
        route: ctx.route?.id,
      })
    }

    if (failure.expose && !ctx.responseStarted && !res.headersSent) {
      this.responder.send(res, failure, ctx.requestId)
      return
    }
    if (!res.destroyed) {
      res.destroy()
    }
  }

  private finish(ctx: InFlightRequest): void {
    for (const slot of ctx.slots) {
      slot.release()
    }
    for (const cleanup of ctx.cleanup) {
      cleanup()
    }
    this.active.delete(ctx)
    if (this.active.size === 0) {
      for (const resolve of this.idleWaiters.splice(0)) {
        resolve()
      }
    }
  }

  private emit(event: RequestOutcomeEvent): void {
    this.logger.logRequestOutcome(event)
    if (!this.hooks.onRequestOutcome) return
    try {
      this.hooks.onRequestOutcome(event)
    } catch (error) {
      this.logger.error('Request outcome hook failed', toError(error), {
        requestId: event.requestId,
      })
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
