/**
 * Host-pattern routing
 *
 * Resolves hosts shaped `<serviceId>-<port>.<domainSuffix>` into a route to
 * `<serviceId>.<namespace>.svc.cluster.local:<port>`, where the namespace
 * comes from the service registry. The router is only consulted after the
 * route table returned no match.
 *
 * @example
 * ```ts
 * const registry = new ServiceRegistry()
 * registry.register('a1b2c3', 'team-alpha')
 *
 * const router = new HostPatternRouter({ registry, domainSuffix: 'gw.example.com' })
 * router.resolve('a1b2c3-8080.gw.example.com')
 * // route 'service:a1b2c3:8080' -> http://a1b2c3.team-alpha.svc.cluster.local:8080
 * ```
 */
import type { Logger } from '../interfaces/logger'
import type { Route, RoutePolicy } from '../interfaces/route'
import { defaultLogger } from '../logger/pino-logger'
import { buildRoute, normalizeHost } from './route-table'

const ROUTE_CACHE_LIMIT = 1024

const SERVICE_HOST_PATTERN = /^([a-z\d](?:[-a-z\d]*[a-z\d])?)-(\d+)\./

export const DEFAULT_BACKEND_TEMPLATE =
  'http://{id}.{namespace}.svc.cluster.local:{port}'

export interface ServiceHost {
  serviceId: string
  port: number
}

/**
 * Extracts the service id and port from a host
 *
 * The id is the longest DNS-label-like prefix before the last `-<digits>`
 * of the first label, so `my-svc-8080.x` yields `my-svc` and 8080.
 *
 * @returns null when the host does not follow the pattern, the port is out
 * of range, or the host is outside the configured domain suffix
 */
export function parseServiceHost(
  host: string,
  domainSuffix?: string,
): ServiceHost | null {
  const normalized = normalizeHost(host)
  if (domainSuffix) {
    const suffix = `.${domainSuffix.toLowerCase().replace(/^\.+/, '')}`
    if (!normalized.endsWith(suffix)) return null
  }

  const match = SERVICE_HOST_PATTERN.exec(normalized)
  if (!match) return null

  const [, serviceId, portText] = match
  if (serviceId === undefined || portText === undefined) return null

  const port = Number(portText)
  if (!Number.isInteger(port) || port < 1 || port > 65535) return null

  return { serviceId, port }
}

/**
 * Maps service ids to the namespace their backend lives in
 */
export class ServiceRegistry {
  private services = new Map<string, string>()

  /**
   * @returns true when the id was not registered before
   */
  register(serviceId: string, namespace: string): boolean {
    const isNew = !this.services.has(serviceId)
    this.services.set(serviceId, namespace)
    return isNew
  }

  /**
   * @returns true when the id was registered
   */
  unregister(serviceId: string): boolean {
    return this.services.delete(serviceId)
  }

  get(serviceId: string): string | undefined {
    return this.services.get(serviceId)
  }

  /**
   * Swap the whole registry in one step
   */
  replaceAll(entries: Record<string, string>): void {
    this.services = new Map(Object.entries(entries))
  }

  clear(): void {
    this.services.clear()
  }

  get size(): number {
    return this.services.size
  }
}

export interface HostPatternRouterOptions {
  registry: ServiceRegistry
  domainSuffix?: string
  backendTemplate?: string
  defaults?: Partial<RoutePolicy>
  logger?: Logger
}

/**
 * Builds routes on the fly for service hosts
 */
export class HostPatternRouter {
  private readonly registry: ServiceRegistry
  private domainSuffix?: string
  private backendTemplate: string
  private defaults: Partial<RoutePolicy>
  private cache = new Map<string, Route>()
  private logger: Logger

  constructor(options: HostPatternRouterOptions) {
    this.registry = options.registry
    this.domainSuffix = options.domainSuffix
    this.backendTemplate = options.backendTemplate ?? DEFAULT_BACKEND_TEMPLATE
    this.defaults = options.defaults ?? {}
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Replace suffix, template and defaults; cached routes are dropped
   */
  configure(options: Omit<HostPatternRouterOptions, 'registry' | 'logger'>) {
    this.domainSuffix = options.domainSuffix
    this.backendTemplate = options.backendTemplate ?? DEFAULT_BACKEND_TEMPLATE
    this.defaults = options.defaults ?? {}
    this.cache.clear()
  }

  /**
   * @returns a frozen single-target route, or null when the host is not a
   * service host or its service id is unknown
   */
  resolve(host: string): Route | null {
    const parsed = parseServiceHost(host, this.domainSuffix)
    if (!parsed) return null

    const namespace = this.registry.get(parsed.serviceId)
    if (namespace === undefined) {
      this.logger.debug('Unknown service id in host', {
        host,
        serviceId: parsed.serviceId,
      })
      return null
    }

    const key = `${parsed.serviceId}:${parsed.port}:${namespace}`
    const cached = this.cache.get(key)
    if (cached) return cached

    const url = this.backendTemplate
      .replaceAll('{id}', parsed.serviceId)
      .replaceAll('{namespace}', namespace)
      .replaceAll('{port}', String(parsed.port))

    const route = buildRoute(
      {
        id: `service:${parsed.serviceId}:${parsed.port}`,
        pathPrefix: '/',
        targets: [{ url }],
      },
      this.defaults,
    )
    if (this.cache.size >= ROUTE_CACHE_LIMIT) {
      this.cache.clear()
    }
    this.cache.set(key, route)
    return route
  }
}
