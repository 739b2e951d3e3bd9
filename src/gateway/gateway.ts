/**
 * httpgate Gateway Implementation
 *
 * Owns the Node HTTP server and wires the forwarding core together: route
 * table, host-pattern router, admission controller, upstream pool, circuit
 * tracker and load balancer. Handles the lifecycle: `listen`, `reload` of
 * the configuration snapshot and graceful `close`.
 *
 * @example
 * ```ts
 * const gateway = new HttpGateway({
 *   server: { port: 8080 },
 *   routes: [
 *     {
 *       pathPrefix: '/api/users/*',
 *       targets: [{ url: 'http://users-1:3000' }, { url: 'http://users-2:3000' }],
 *       strategy: 'round-robin',
 *       retries: 2,
 *     },
 *   ],
 *   hooks: {
 *     onRequestOutcome: (event) => metrics.observe(event),
 *   },
 * })
 *
 * await gateway.listen()
 * ```
 */
import { createServer } from 'node:http'
import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import { AdmissionController } from '../admission/admission-controller'
import { ErrorResponder } from '../errors/error-responder'
import { CircuitTracker } from '../health/circuit-tracker'
import type {
  Gateway,
  GatewayConfig,
  GatewayStats,
} from '../interfaces/gateway'
import type { GatewayHooks } from '../interfaces/forwarding'
import type { HealthTransitionEvent } from '../interfaces/health'
import type { Logger } from '../interfaces/logger'
import { HttpLoadBalancer } from '../load-balancer/http-load-balancer'
import { createLogger } from '../logger/pino-logger'
import { UndiciConnector } from '../pool/undici-connector'
import { UpstreamPool } from '../pool/upstream-pool'
import { ForwardingEngine } from '../proxy/forwarding-engine'
import { HostPatternRouter, ServiceRegistry } from '../routing/host-pattern'
import { RouteTable } from '../routing/route-table'

export const DEFAULT_PORT = 8080
export const DEFAULT_HOSTNAME = '0.0.0.0'
export const DEFAULT_SHUTDOWN_GRACE_PERIOD = 10000

/**
 * HTTP gateway on node:http
 *
 * Pool, admission and circuit breaker settings are fixed at construction;
 * `reload` swaps routes, route defaults, forwarding and error settings,
 * hooks and the host-pattern configuration.
 */
export class HttpGateway implements Gateway {
  private config: GatewayConfig
  private logger: Logger
  private server: Server | null = null
  private hooks: GatewayHooks
  readonly routeTable: RouteTable
  readonly registry = new ServiceRegistry()
  private hostRouter: HostPatternRouter
  private admission: AdmissionController
  private pool: UpstreamPool
  private tracker: CircuitTracker
  private balancer: HttpLoadBalancer
  private engine: ForwardingEngine

  constructor(config: GatewayConfig = {}) {
    this.config = config
    this.logger = config.logger ?? createLogger()
    this.hooks = config.hooks ?? {}

    this.routeTable = new RouteTable({
      logger: this.logger.child({ component: 'RouteTable' }),
    })
    this.routeTable.publish(config.routes ?? [], config.routeDefaults)

    this.hostRouter = new HostPatternRouter({
      registry: this.registry,
      domainSuffix: config.hostPattern?.domainSuffix,
      backendTemplate: config.hostPattern?.backendTemplate,
      defaults: config.routeDefaults,
      logger: this.logger.child({ component: 'HostPatternRouter' }),
    })
    if (config.hostPattern?.services) {
      this.registry.replaceAll(config.hostPattern.services)
    }

    this.admission = new AdmissionController(
      config.admission,
      this.logger.child({ component: 'AdmissionController' }),
    )
    this.pool = new UpstreamPool(
      config.pool ?? {},
      config.connector ?? new UndiciConnector(config.pool),
      this.logger.child({ component: 'UpstreamPool' }),
    )
    this.tracker = new CircuitTracker({
      ...config.circuitBreaker,
      logger: this.logger.child({ component: 'CircuitTracker' }),
      onTransition: (event: HealthTransitionEvent) =>
        this.hooks.onHealthTransition?.(event),
    })
    this.balancer = new HttpLoadBalancer({
      logger: this.logger.child({ component: 'HttpLoadBalancer' }),
      connections: (target) => this.pool.inUseCount(target),
    })
    this.engine = new ForwardingEngine({
      routeTable: this.routeTable,
      admission: this.admission,
      pool: this.pool,
      tracker: this.tracker,
      balancer: this.balancer,
      hostRouter: config.hostPattern?.enabled ? this.hostRouter : null,
      responder: new ErrorResponder(config.errors),
      forwarding: config.forwarding,
      hooks: this.hooks,
      logger: this.logger.child({ component: 'ForwardingEngine' }),
    })
  }

  /**
   * Request listener, usable with any node:http compatible server
   */
  handler = (req: IncomingMessage, res: ServerResponse): void => {
    req.on('error', (error) => {
      this.logger.debug('Inbound request stream error', {
        error: error.message,
        url: req.url,
      })
    })
    this.engine.handle(req, res).catch((error: unknown) => {
      this.logger.error(
        'Request handling failed',
        error instanceof Error ? error : new Error(String(error)),
      )
    })
  }

  async listen(port?: number): Promise<Server> {
    if (this.server) {
      return this.server
    }

    const listenPort = port ?? this.config.server?.port ?? DEFAULT_PORT
    const hostname = this.config.server?.hostname ?? DEFAULT_HOSTNAME
    const server = createServer(this.handler)

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening)
        reject(error)
      }
      const onListening = () => {
        server.off('error', onError)
        resolve()
      }
      server.once('error', onError)
      server.once('listening', onListening)
      server.listen(listenPort, hostname)
    })

    server.on('error', (error) => {
      this.logger.error('HTTP server error', error)
    })
    this.server = server

    const address = server.address()
    this.logger.info(
      `Server listening on http://${hostname}:${
        typeof address === 'object' && address ? address.port : listenPort
      }`,
    )
    return server
  }

  reload(config: GatewayConfig): number {
    const version = this.routeTable.publish(
      config.routes ?? [],
      config.routeDefaults,
    )

    this.hostRouter.configure({
      domainSuffix: config.hostPattern?.domainSuffix,
      backendTemplate: config.hostPattern?.backendTemplate,
      defaults: config.routeDefaults,
    })
    if (config.hostPattern?.services) {
      this.registry.replaceAll(config.hostPattern.services)
    }

    this.hooks = config.hooks ?? this.hooks
    this.engine.configure({
      hostRouter: config.hostPattern?.enabled ? this.hostRouter : null,
      responder: new ErrorResponder(config.errors),
      forwarding: config.forwarding ?? {},
      hooks: this.hooks,
    })

    const routeIds = new Set(this.routeTable.getRoutes().map((r) => r.id))
    this.balancer.prune(routeIds)

    this.config = {
      ...config,
      logger: this.config.logger,
      connector: this.config.connector,
      pool: this.config.pool,
      admission: this.config.admission,
      circuitBreaker: this.config.circuitBreaker,
    }
    this.logger.info('Configuration reloaded', { version })
    return version
  }

  async close(): Promise<void> {
    const server = this.server
    this.server = null

    if (server) {
      const stopped = new Promise<void>((resolve) => {
        server.close((error) => {
          if (error) {
            this.logger.warn('Server close reported an error', {
              error: error.message,
            })
          }
          resolve()
        })
      })
      server.closeIdleConnections()

      const grace =
        this.config.server?.shutdownGracePeriod ?? DEFAULT_SHUTDOWN_GRACE_PERIOD
      const drained = await this.waitForIdle(grace)
      if (!drained) {
        this.logger.warn('Shutdown grace period elapsed, closing connections', {
          inFlight: this.engine.inFlight,
          gracePeriod: grace,
        })
      }
      server.closeAllConnections()
      await stopped
    }

    await this.pool.close()
    this.logger.info('Gateway closed')
  }

  getStats(): GatewayStats {
    return {
      inFlight: this.engine.inFlight,
      routeTableVersion: this.routeTable.getVersion(),
      routes: this.routeTable.getRoutes().length,
      admission: this.admission.getStats(),
      pools: this.pool.getStats(),
      circuits: this.tracker.getSnapshot(),
    }
  }

  getConfig(): GatewayConfig {
    return this.config
  }

  private async waitForIdle(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })
    try {
      return await Promise.race([
        this.engine.whenIdle().then(() => true),
        expired,
      ])
    } finally {
      clearTimeout(timer)
    }
  }
}
