/**
 * httpgate TypeScript Interface Definitions
 *
 * Configuration, event and snapshot types shared by the gateway components.
 *
 * @example
 * ```ts
 * import type { GatewayConfig, RouteConfig } from 'httpgate'
 *
 * const users: RouteConfig = {
 *   pathPrefix: '/api/users/*',
 *   targets: [{ url: 'http://users:3000' }],
 * }
 * const config: GatewayConfig = { routes: [users] }
 * ```
 */

// Gateway
export type {
  Gateway,
  GatewayConfig,
  GatewayStats,
  HostPatternConfig,
} from './gateway'

// Routing
export type {
  BalancingStrategy,
  EligibilityPredicate,
  Route,
  RouteConfig,
  RoutePolicy,
  RouteResolution,
  UpstreamTarget,
  UpstreamTargetConfig,
} from './route'

// Upstream connections
export type {
  ConnectionOutcome,
  PoolConfig,
  PooledConnection,
  TargetPoolStats,
  UpstreamConnector,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamTransport,
} from './pool'

// Admission control
export type {
  AdmissionConfig,
  AdmissionScope,
  AdmissionScopeStats,
} from './admission'

// Target health
export type {
  CircuitBreakerConfig,
  CircuitPermit,
  CircuitState,
  HealthTransitionEvent,
  TargetHealthSnapshot,
} from './health'

// Forwarding, errors and hooks
export type {
  ErrorResponseConfig,
  ForwardingConfig,
  GatewayHooks,
  RequestOutcome,
  RequestOutcomeEvent,
  RequestOutcomeKind,
} from './forwarding'

// Load Balancing
export type {
  AttemptPlan,
  LoadBalancerOptions,
  LoadBalancerStats,
} from './load-balancer'

// Logging
export type { LogLevel, Logger, LoggerConfig } from './logger'
