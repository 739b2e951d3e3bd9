/**
 * Copy-on-write Route Table
 *
 * Maps (host, path prefix) to an ordered list of upstream targets plus the
 * per-route forwarding policy. Rules are validated, normalized and frozen on
 * `publish`, then the snapshot reference is swapped in one assignment, so a
 * lookup always sees either the previous or the new table.
 *
 * Matching order:
 * 1. Longest path prefix (segment aware, `/api` never matches `/apix`)
 * 2. Longest host match (exact host beats `*.domain`, both beat no host)
 * 3. Registration order
 *
 * @example
 * ```ts
 * const table = new RouteTable()
 * table.publish([
 *   { pathPrefix: '/api/*', targets: [{ url: 'http://a:3000' }, { url: 'http://b:3000' }] },
 * ])
 *
 * const result = table.resolve('gw.local', '/api/users', (t) => tracker.isEligible(t))
 * if (result.kind === 'matched') {
 *   console.log(result.route.id, result.candidates.map((t) => t.url))
 * }
 * ```
 */
import { ConfigError } from '../errors/gateway-errors'
import type { Logger } from '../interfaces/logger'
import type {
  EligibilityPredicate,
  Route,
  RouteConfig,
  RoutePolicy,
  RouteResolution,
  UpstreamTarget,
  UpstreamTargetConfig,
} from '../interfaces/route'
import { defaultLogger } from '../logger/pino-logger'

export const DEFAULT_ROUTE_POLICY: Readonly<RoutePolicy> = Object.freeze({
  timeout: 30000,
  retries: 1,
  maxConcurrency: 0,
  strategy: 'failover',
})

interface CompiledRoute {
  route: Route
  prefix: string
  /** Exact host, or the suffix (leading dot kept) of a wildcard host */
  host: string | null
  wildcard: boolean
}

interface RouteSnapshot {
  readonly version: number
  readonly entries: readonly CompiledRoute[]
}

/**
 * Lower-cases a Host header value and drops any port, IPv6 literals included
 */
export function normalizeHost(host: string): string {
  const value = host.trim().toLowerCase()
  if (value.startsWith('[')) {
    const end = value.indexOf(']')
    return end === -1 ? value : value.slice(0, end + 1)
  }
  const colon = value.indexOf(':')
  return colon === -1 ? value : value.slice(0, colon)
}

/**
 * `/api/*`, `/api/` and `/api` all become `/api`; `/*` and `/` become `/`
 */
export function normalizePrefix(prefix: string): string {
  let value = prefix.trim()
  if (value.endsWith('*')) {
    value = value.slice(0, -1)
  }
  while (value.length > 1 && value.endsWith('/')) {
    value = value.slice(0, -1)
  }
  return value === '' ? '/' : value
}

function matchesPrefix(prefix: string, path: string): boolean {
  if (prefix === '/') return true
  return path === prefix || path.startsWith(`${prefix}/`)
}

function hostMatchLength(entry: CompiledRoute, host: string): number {
  if (entry.host === null) return 0
  if (entry.wildcard) {
    return host.endsWith(entry.host) && host.length > entry.host.length
      ? entry.host.length
      : -1
  }
  return host === entry.host ? entry.host.length : -1
}

/**
 * Normalizes a configured target; throws ConfigError for unusable URLs
 */
export function normalizeTarget(
  config: UpstreamTargetConfig,
  routeId: string,
): UpstreamTarget {
  let url: URL
  try {
    url = new URL(config.url)
  } catch {
    throw new ConfigError(`Route ${routeId} has an invalid target URL`, [
      config.url,
    ])
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Route ${routeId} target must be http or https`, [
      config.url,
    ])
  }
  const weight = config.weight ?? 1
  if (!(weight > 0)) {
    throw new ConfigError(`Route ${routeId} target weight must be positive`, [
      `${config.url}: ${weight}`,
    ])
  }

  const basePath = url.pathname === '/' ? '' : url.pathname.replace(/\/+$/, '')
  return Object.freeze({
    url: `${url.origin}${basePath}`,
    origin: url.origin,
    basePath,
    weight,
    ...(config.metadata
      ? { metadata: Object.freeze({ ...config.metadata }) }
      : {}),
  })
}

function validatePolicy(policy: RoutePolicy, routeId: string): void {
  const issues: string[] = []
  if (!(policy.timeout > 0)) issues.push(`timeout: ${policy.timeout}`)
  if (!Number.isInteger(policy.retries) || policy.retries < 0) {
    issues.push(`retries: ${policy.retries}`)
  }
  if (!Number.isInteger(policy.maxConcurrency) || policy.maxConcurrency < 0) {
    issues.push(`maxConcurrency: ${policy.maxConcurrency}`)
  }
  if (issues.length > 0) {
    throw new ConfigError(`Route ${routeId} has an invalid policy`, issues)
  }
}

/**
 * Builds one frozen Route from its configuration
 */
export function buildRoute(
  config: RouteConfig,
  defaults: Partial<RoutePolicy> = {},
): Route {
  if (!config.pathPrefix.startsWith('/')) {
    throw new ConfigError('Route pathPrefix must start with "/"', [
      config.pathPrefix,
    ])
  }
  const id = config.id ?? `${config.host ?? '*'}${config.pathPrefix}`
  if (config.targets.length === 0) {
    throw new ConfigError(`Route ${id} has no targets`)
  }

  const policy: RoutePolicy = {
    timeout: config.timeout ?? defaults.timeout ?? DEFAULT_ROUTE_POLICY.timeout,
    retries: config.retries ?? defaults.retries ?? DEFAULT_ROUTE_POLICY.retries,
    maxConcurrency:
      config.maxConcurrency ??
      defaults.maxConcurrency ??
      DEFAULT_ROUTE_POLICY.maxConcurrency,
    strategy:
      config.strategy ?? defaults.strategy ?? DEFAULT_ROUTE_POLICY.strategy,
  }
  validatePolicy(policy, id)

  return Object.freeze({
    id,
    ...(config.host ? { host: config.host.toLowerCase() } : {}),
    pathPrefix: normalizePrefix(config.pathPrefix),
    targets: Object.freeze(
      config.targets.map((target) => normalizeTarget(target, id)),
    ),
    policy: Object.freeze(policy),
    stripPrefix: config.stripPrefix ?? false,
    preserveHost: config.preserveHost ?? true,
    headers: Object.freeze({ ...config.headers }),
  })
}

function compile(route: Route): CompiledRoute {
  const host = route.host ?? null
  const wildcard = host !== null && host.startsWith('*.')
  return {
    route,
    prefix: route.pathPrefix,
    host: wildcard && host !== null ? host.slice(1) : host,
    wildcard,
  }
}

/**
 * Route table with atomic snapshot replacement
 */
export class RouteTable {
  private snapshot: RouteSnapshot = { version: 0, entries: [] }
  private logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Validate and publish a new set of rules
   *
   * Nothing is swapped when validation fails: the ConfigError propagates and
   * the previous snapshot stays in place.
   *
   * @returns Version of the published snapshot
   */
  publish(
    routes: readonly RouteConfig[],
    defaults: Partial<RoutePolicy> = {},
  ): number {
    const seen = new Set<string>()
    const entries: CompiledRoute[] = []
    for (const config of routes) {
      const route = buildRoute(config, defaults)
      if (seen.has(route.id)) {
        throw new ConfigError('Duplicate route id', [route.id])
      }
      seen.add(route.id)
      entries.push(compile(route))
    }

    const version = this.snapshot.version + 1
    this.snapshot = Object.freeze({ version, entries: Object.freeze(entries) })

    this.logger.info('Route table published', {
      version,
      routes: entries.length,
    })
    return version
  }

  /**
   * Find the most specific route for a request
   *
   * @param host - Host header value, port allowed
   * @param path - Request path, query string allowed
   * @param isEligible - Filters candidates, typically the circuit tracker
   */
  resolve(
    host: string,
    path: string,
    isEligible?: EligibilityPredicate,
  ): RouteResolution {
    const snapshot = this.snapshot
    const normalizedHost = normalizeHost(host)
    const queryIndex = path.indexOf('?')
    const pathname = queryIndex === -1 ? path : path.slice(0, queryIndex)

    let best: CompiledRoute | null = null
    let bestPrefix = -1
    let bestHost = -1

    for (const entry of snapshot.entries) {
      if (!matchesPrefix(entry.prefix, pathname)) continue
      const hostLength = hostMatchLength(entry, normalizedHost)
      if (hostLength < 0) continue

      const prefixLength = entry.prefix.length
      if (
        prefixLength > bestPrefix ||
        (prefixLength === bestPrefix && hostLength > bestHost)
      ) {
        best = entry
        bestPrefix = prefixLength
        bestHost = hostLength
      }
    }

    if (!best) {
      return { kind: 'no-route', version: snapshot.version }
    }

    const { route } = best
    const eligible = isEligible
      ? route.targets.filter((target) => isEligible(target))
      : route.targets

    if (eligible.length === 0) {
      return {
        kind: 'matched',
        route,
        candidates: route.targets,
        degraded: true,
        version: snapshot.version,
      }
    }

    return {
      kind: 'matched',
      route,
      candidates: eligible,
      degraded: false,
      version: snapshot.version,
    }
  }

  getVersion(): number {
    return this.snapshot.version
  }

  getRoutes(): readonly Route[] {
    return this.snapshot.entries.map((entry) => entry.route)
  }
}
