/**
 * Balancing strategy used to order a route's candidates into an attempt plan
 * - failover: first healthy target in list order (default)
 * - round-robin: rotate the starting candidate on every request
 * - weighted: weighted random start, remaining candidates follow in list order
 * - random: uniform random start
 * - least-connections: fewest pooled connections in use first
 */
export type BalancingStrategy =
  | 'failover'
  | 'round-robin'
  | 'weighted'
  | 'random'
  | 'least-connections'

/**
 * Upstream target as written in configuration
 */
export interface UpstreamTargetConfig {
  /**
   * Target base URL (protocol, host, port and optional base path)
   * @example 'http://users-1.internal:3000' or 'http://legacy:8080/v1'
   */
  url: string

  /**
   * Relative weight for the weighted strategy
   * @default 1
   */
  weight?: number

  /**
   * Free-form labels carried into events
   * @example { zone: 'eu-west-1a' }
   */
  metadata?: Record<string, string>
}

/**
 * Normalized upstream target inside a published route table.
 * Health state is not part of the target: it is owned by the circuit tracker.
 */
export interface UpstreamTarget {
  /** Normalized URL, used as the target identity in events */
  readonly url: string
  /** Scheme, host and port; connections are pooled per origin */
  readonly origin: string
  /** Path prepended to every forwarded request, without trailing slash */
  readonly basePath: string
  readonly weight: number
  readonly metadata?: Readonly<Record<string, string>>
}

/**
 * Per-route forwarding policy
 */
export interface RoutePolicy {
  /**
   * Deadline for the whole request in milliseconds, retries included
   * @default 30000
   */
  timeout: number

  /**
   * Additional attempts on connection or pre-response transport failures
   * @default 1
   */
  retries: number

  /**
   * Concurrent in-flight requests allowed on this route, 0 for unlimited
   * @default 0
   */
  maxConcurrency: number

  /**
   * @default 'failover'
   */
  strategy: BalancingStrategy
}

/**
 * Route rule as written in configuration
 */
export interface RouteConfig extends Partial<RoutePolicy> {
  /**
   * Stable identifier used for admission scopes and events
   * @default `${host ?? '*'}${pathPrefix}`
   */
  id?: string

  /**
   * Host to match, exact or leading wildcard; matches any host when omitted
   * @example 'api.example.com' or '*.example.com'
   */
  host?: string

  /**
   * Path prefix to match, segment aware
   * @example '/api' or '/api/*' (both match /api and /api/users)
   */
  pathPrefix: string

  /**
   * Ordered upstream targets
   */
  targets: UpstreamTargetConfig[]

  /**
   * Remove the matched prefix before forwarding
   * @default false
   */
  stripPrefix?: boolean

  /**
   * Forward the client's Host header instead of the target's
   * @default true
   */
  preserveHost?: boolean

  /**
   * Extra headers set on every forwarded request
   */
  headers?: Record<string, string>
}

/**
 * Immutable route inside a published snapshot
 */
export interface Route {
  readonly id: string
  readonly host?: string
  readonly pathPrefix: string
  readonly targets: readonly UpstreamTarget[]
  readonly policy: Readonly<RoutePolicy>
  readonly stripPrefix: boolean
  readonly preserveHost: boolean
  readonly headers: Readonly<Record<string, string>>
}

/**
 * Result of a route table lookup
 */
export type RouteResolution =
  | {
      kind: 'matched'
      route: Route
      /** Eligible targets in list order, or every target when degraded */
      candidates: readonly UpstreamTarget[]
      /** True when no target was eligible and the full list is tried anyway */
      degraded: boolean
      /** Version of the snapshot the lookup observed */
      version: number
    }
  | { kind: 'no-route'; version: number }

/**
 * Predicate deciding whether a target may receive traffic
 */
export type EligibilityPredicate = (target: UpstreamTarget) => boolean
