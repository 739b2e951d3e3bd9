/**
 * httpgate - HTTP reverse proxy and load-balancing gateway
 *
 * Routes inbound requests by host and path prefix to pools of upstream
 * targets, with per-target connection pooling, admission control, circuit
 * breaking and bounded retries.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createGateway } from 'httpgate'
 *
 * const gateway = createGateway({
 *   server: { port: 8080 },
 *   routes: [
 *     {
 *       pathPrefix: '/api/users/*',
 *       targets: [
 *         { url: 'http://user-service-1:3000' },
 *         { url: 'http://user-service-2:3000' },
 *       ],
 *       strategy: 'least-connections',
 *     },
 *   ],
 * })
 *
 * await gateway.listen()
 * ```
 *
 * ## Request path
 *
 * ```
 * client ─► RouteTable ─► AdmissionController ─► HttpLoadBalancer
 *                                                      │
 *            CircuitTracker ◄─ ForwardingEngine ◄──────┘
 *                                   │
 *                              UpstreamPool ─► upstream
 * ```
 */
// ==================== CORE CLASSES ====================

export { HttpGateway } from './gateway/gateway'
export { ForwardingEngine } from './proxy/forwarding-engine'
export { RouteTable, DEFAULT_ROUTE_POLICY } from './routing/route-table'
export {
  HostPatternRouter,
  ServiceRegistry,
  parseServiceHost,
} from './routing/host-pattern'
export { UpstreamPool } from './pool/upstream-pool'
export { UndiciConnector } from './pool/undici-connector'
export {
  AdmissionController,
  AdmissionSlot,
} from './admission/admission-controller'
export { CircuitTracker } from './health/circuit-tracker'
export {
  HttpLoadBalancer,
  createLoadBalancer,
} from './load-balancer/http-load-balancer'
export { GateLogger, createLogger } from './logger/pino-logger'

// ==================== ERRORS ====================

export * from './errors/gateway-errors'
export { ErrorResponder } from './errors/error-responder'

// ==================== CONFIGURATION ====================

export { parseGatewayConfig, gatewayConfigSchema } from './config/schema'
export { loadConfigFromEnv, loadConfigFile } from './config/env'

// ==================== INTERFACES ====================

export type * from './interfaces/index'

// ==================== DEFAULT EXPORT ====================

export { HttpGateway as default } from './gateway/gateway'

// ==================== UTILITIES ====================

import type { GatewayConfig } from './interfaces/gateway'
import { HttpGateway } from './gateway/gateway'

/**
 * Create a gateway instance
 */
export function createGateway(config?: GatewayConfig): HttpGateway {
  return new HttpGateway(config)
}
