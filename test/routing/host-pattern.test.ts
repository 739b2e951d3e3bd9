import { describe, test, expect, beforeEach } from 'vitest'
import {
  HostPatternRouter,
  ServiceRegistry,
  parseServiceHost,
} from '../../src/routing/host-pattern'
import { silentLogger } from '../helpers'

describe('parseServiceHost', () => {
  test('extracts service id and port', () => {
    expect(parseServiceHost('a1b2c3-8080.gw.example.com')).toEqual({
      serviceId: 'a1b2c3',
      port: 8080,
    })
    expect(parseServiceHost('my-svc-3000.gw.example.com:443')).toEqual({
      serviceId: 'my-svc',
      port: 3000,
    })
  })

  test('rejects hosts outside the pattern or port range', () => {
    expect(parseServiceHost('plainhost.example.com')).toBeNull()
    expect(parseServiceHost('svc-0.example.com')).toBeNull()
    expect(parseServiceHost('svc-70000.example.com')).toBeNull()
    expect(parseServiceHost('svc-8080')).toBeNull()
  })

  test('enforces the domain suffix', () => {
    expect(
      parseServiceHost('svc-8080.gw.example.com', 'gw.example.com'),
    ).toEqual({ serviceId: 'svc', port: 8080 })
    expect(parseServiceHost('svc-8080.other.com', 'gw.example.com')).toBeNull()
    expect(
      parseServiceHost('svc-8080.evilgw.example.com', 'gw.example.com'),
    ).toBeNull()
  })
})

describe('ServiceRegistry', () => {
  test('tracks registrations', () => {
    const registry = new ServiceRegistry()
    expect(registry.register('svc', 'team-a')).toBe(true)
    expect(registry.register('svc', 'team-b')).toBe(false)
    expect(registry.get('svc')).toBe('team-b')
    expect(registry.size).toBe(1)

    expect(registry.unregister('svc')).toBe(true)
    expect(registry.unregister('svc')).toBe(false)
    expect(registry.size).toBe(0)
  })

  test('replaceAll swaps every entry', () => {
    const registry = new ServiceRegistry()
    registry.register('old', 'ns')
    registry.replaceAll({ a: 'ns-a', b: 'ns-b' })
    expect(registry.get('old')).toBeUndefined()
    expect(registry.get('b')).toBe('ns-b')
    expect(registry.size).toBe(2)

    registry.clear()
    expect(registry.size).toBe(0)
  })
})

describe('HostPatternRouter', () => {
  let registry: ServiceRegistry
  let router: HostPatternRouter

  beforeEach(() => {
    registry = new ServiceRegistry()
    registry.register('a1b2c3', 'team-alpha')
    router = new HostPatternRouter({
      registry,
      domainSuffix: 'gw.example.com',
      defaults: { timeout: 2000 },
      logger: silentLogger,
    })
  })

  test('builds a single-target route from the template', () => {
    const route = router.resolve('a1b2c3-8080.gw.example.com')
    expect(route?.id).toBe('service:a1b2c3:8080')
    expect(route?.pathPrefix).toBe('/')
    expect(route?.policy.timeout).toBe(2000)
    expect(route?.targets.map((t) => t.url)).toEqual([
      'http://a1b2c3.team-alpha.svc.cluster.local:8080',
    ])
  })

  test('returns null for unknown services and foreign domains', () => {
    expect(router.resolve('zzz-8080.gw.example.com')).toBeNull()
    expect(router.resolve('a1b2c3-8080.elsewhere.com')).toBeNull()
  })

  test('caches routes per service, port and namespace', () => {
    const first = router.resolve('a1b2c3-8080.gw.example.com')
    expect(router.resolve('a1b2c3-8080.gw.example.com')).toBe(first)

    registry.register('a1b2c3', 'team-beta')
    const moved = router.resolve('a1b2c3-8080.gw.example.com')
    expect(moved).not.toBe(first)
    expect(moved?.targets[0]?.url).toBe(
      'http://a1b2c3.team-beta.svc.cluster.local:8080',
    )
  })

  test('configure applies a new template', () => {
    router.configure({
      domainSuffix: 'gw.example.com',
      backendTemplate: 'http://{id}-{port}.{namespace}.internal',
    })
    expect(
      router.resolve('a1b2c3-9000.gw.example.com')?.targets[0]?.url,
    ).toBe('http://a1b2c3-9000.team-alpha.internal')
  })
})
