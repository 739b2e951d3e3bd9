import type { Server } from 'node:http'
import type { AdmissionConfig, AdmissionScopeStats } from './admission'
import type {
  ErrorResponseConfig,
  ForwardingConfig,
  GatewayHooks,
} from './forwarding'
import type { CircuitBreakerConfig, TargetHealthSnapshot } from './health'
import type { Logger } from './logger'
import type { PoolConfig, TargetPoolStats, UpstreamConnector } from './pool'
import type { RouteConfig, RoutePolicy } from './route'

/**
 * Dynamic routing for hosts shaped `<serviceId>-<port>.<domainSuffix>`
 */
export interface HostPatternConfig {
  /**
   * Enable host-pattern resolution for requests no route matched
   * @default false
   */
  enabled?: boolean

  /**
   * Domain the service hosts live under; any domain when omitted
   * @example 'gw.example.com'
   */
  domainSuffix?: string

  /**
   * Upstream URL template, with {id}, {namespace} and {port} placeholders
   * @default 'http://{id}.{namespace}.svc.cluster.local:{port}'
   */
  backendTemplate?: string

  /**
   * Initial service registry entries, serviceId to namespace
   * @example { 'a1b2c3': 'team-alpha' }
   */
  services?: Record<string, string>
}

/**
 * Main gateway configuration interface
 * Handed to the gateway at startup and again on every reload
 */
export interface GatewayConfig {
  /**
   * Server configuration options
   */
  server?: {
    /**
     * Port number for the gateway server
     * @default 8080
     */
    port?: number
    /**
     * Hostname or IP address to bind to
     * @default "0.0.0.0"
     */
    hostname?: string
    /**
     * Time allowed for in-flight requests to finish on close, in milliseconds
     * @default 10000
     */
    shutdownGracePeriod?: number
  }

  /**
   * Ordered route rules
   */
  routes?: RouteConfig[]

  /**
   * Policy applied to routes that leave a field unset
   */
  routeDefaults?: Partial<RoutePolicy>

  /**
   * Upstream connection pool settings, per target
   */
  pool?: PoolConfig

  /**
   * Global admission control
   */
  admission?: AdmissionConfig

  /**
   * Per-target circuit breaker thresholds
   */
  circuitBreaker?: CircuitBreakerConfig

  forwarding?: ForwardingConfig

  errors?: ErrorResponseConfig

  hostPattern?: HostPatternConfig

  hooks?: GatewayHooks

  /**
   * Logger instance, a default pino logger is created when omitted
   */
  logger?: Logger

  /**
   * Transport factory for upstream connections, undici by default
   */
  connector?: UpstreamConnector
}

export interface GatewayStats {
  inFlight: number
  routeTableVersion: number
  routes: number
  admission: AdmissionScopeStats[]
  pools: Record<string, TargetPoolStats>
  circuits: TargetHealthSnapshot[]
}

/**
 * Public surface of a running gateway
 */
export interface Gateway {
  /**
   * Start accepting connections
   * Rejects when the address cannot be bound
   * @param port - Overrides config.server.port, 0 picks a free port
   */
  listen(port?: number): Promise<Server>

  /**
   * Publish a new configuration snapshot
   * Routes, defaults and host-pattern services are swapped atomically;
   * in-flight requests finish on the snapshot they resolved against
   */
  reload(config: GatewayConfig): number

  /**
   * Stop accepting, drain in-flight requests up to the grace period,
   * then destroy what is left and close the upstream pools
   */
  close(): Promise<void>

  getStats(): GatewayStats

  getConfig(): GatewayConfig
}
