import { request } from 'node:http'
import type { IncomingHttpHeaders } from 'node:http'
import { describe, test, expect, afterEach, vi } from 'vitest'
import { HttpGateway } from '../../src/gateway/gateway'
import { ConfigError } from '../../src/errors/gateway-errors'
import type { HealthTransitionEvent } from '../../src/interfaces/health'
import { addressOf, silentLogger, startServer, unusedUrl } from '../helpers'
import type { TestServer } from '../helpers'

interface Reply {
  status: number
  headers: IncomingHttpHeaders
  body: string
}

/**
 * GET with a chosen Host header, which fetch does not let us set
 */
function get(url: string, headers: Record<string, string> = {}) {
  return new Promise<Reply>((resolve, reject) => {
    const req = request(url, { headers }, (res) => {
      const chunks: Buffer[] = []
      res.on('data', (chunk: Buffer) => chunks.push(chunk))
      res.on('end', () =>
        resolve({
          status: res.statusCode ?? 0,
          headers: res.headers,
          body: Buffer.concat(chunks).toString(),
        }),
      )
      res.on('error', reject)
    })
    req.on('error', reject)
    req.end()
  })
}

describe('HttpGateway', () => {
  const servers: TestServer[] = []
  const gateways: HttpGateway[] = []

  afterEach(async () => {
    await Promise.all(gateways.splice(0).map((gateway) => gateway.close()))
    await Promise.all(servers.splice(0).map((server) => server.close()))
  })

  async function upstream(name: string): Promise<TestServer> {
    const server = await startServer((req, res) => {
      res.writeHead(200, { 'content-type': 'text/plain' })
      res.end(`${name} ${req.url ?? ''}`)
    })
    servers.push(server)
    return server
  }

  function create(config: ConstructorParameters<typeof HttpGateway>[0] = {}) {
    const gateway = new HttpGateway({
      logger: silentLogger,
      server: { hostname: '127.0.0.1', shutdownGracePeriod: 200 },
      ...config,
    })
    gateways.push(gateway)
    return gateway
  }

  async function listen(gateway: HttpGateway): Promise<string> {
    const server = await gateway.listen(0)
    return `http://127.0.0.1:${addressOf(server).port}`
  }

  test('starts with an empty route table', () => {
    const gateway = create()
    expect(gateway.getStats()).toEqual({
      inFlight: 0,
      routeTableVersion: 1,
      routes: 0,
      admission: [],
      pools: {},
      circuits: [],
    })
  })

  test('rejects invalid routes at construction', () => {
    expect(() =>
      create({ routes: [{ pathPrefix: 'api', targets: [] }] }),
    ).toThrow(ConfigError)
  })

  test('listen rejects when the port is taken', async () => {
    const first = create()
    const server = await first.listen(0)
    const second = create()
    await expect(second.listen(addressOf(server).port)).rejects.toThrow(
      /EADDRINUSE/,
    )
  })

  test('listen twice returns the same server', async () => {
    const gateway = create()
    const server = await gateway.listen(0)
    expect(await gateway.listen(0)).toBe(server)
  })

  test('reload swaps routes and keeps the old table on error', async () => {
    const a = await upstream('a')
    const b = await upstream('b')
    const gateway = create({
      routes: [{ id: 'main', pathPrefix: '/', targets: [{ url: a.url }] }],
    })
    const url = await listen(gateway)

    expect((await get(`${url}/x`)).body).toBe('a /x')

    const version = gateway.reload({
      routes: [{ id: 'main', pathPrefix: '/', targets: [{ url: b.url }] }],
    })
    expect(version).toBe(2)
    expect((await get(`${url}/x`)).body).toBe('b /x')

    expect(() =>
      gateway.reload({
        routes: [
          { id: 'dup', pathPrefix: '/', targets: [{ url: a.url }] },
          { id: 'dup', pathPrefix: '/v2', targets: [{ url: a.url }] },
        ],
      }),
    ).toThrow('Duplicate route id: dup')
    expect(gateway.getStats().routeTableVersion).toBe(2)
    expect((await get(`${url}/x`)).body).toBe('b /x')
  })

  test('reload keeps pool and circuit settings from construction', () => {
    const gateway = create({
      pool: { maxConnections: 4 },
      circuitBreaker: { failureThreshold: 2 },
    })
    gateway.reload({ routes: [], pool: { maxConnections: 99 } })
    expect(gateway.getConfig().pool).toEqual({ maxConnections: 4 })
    expect(gateway.getConfig().circuitBreaker).toEqual({ failureThreshold: 2 })
  })

  test('routes service hosts through the host-pattern router', async () => {
    const live = await upstream('svc')
    const port = addressOf(live.server).port
    const gateway = create({
      hostPattern: {
        enabled: true,
        domainSuffix: 'gw.test',
        backendTemplate: 'http://127.0.0.1:{port}',
        services: { a1b2c3: 'team-alpha' },
      },
    })
    const url = await listen(gateway)

    const reply = await get(`${url}/hello`, {
      host: `a1b2c3-${port}.gw.test`,
    })
    expect(reply.status).toBe(200)
    expect(reply.body).toBe('svc /hello')

    const unknown = await get(`${url}/hello`, {
      host: `ffffff-${port}.gw.test`,
    })
    expect(unknown.status).toBe(404)
  })

  test('reports circuit transitions through the hook', async () => {
    const dead = await unusedUrl()
    const transitions: HealthTransitionEvent[] = []
    const gateway = create({
      routes: [{ pathPrefix: '/', targets: [{ url: dead }], retries: 0 }],
      circuitBreaker: { failureThreshold: 1 },
      hooks: { onHealthTransition: (event) => transitions.push(event) },
    })
    const url = await listen(gateway)

    expect((await get(`${url}/`)).status).toBe(502)
    await vi.waitFor(() => {
      expect(transitions).toHaveLength(1)
    })
    expect(transitions[0]).toMatchObject({
      target: dead,
      from: 'closed',
      to: 'open',
    })
  })

  test('close waits for requests in flight', async () => {
    let finish: () => void = () => {}
    let arrive: () => void = () => {}
    const arrived = new Promise<void>((resolve) => {
      arrive = resolve
    })
    const slow = await startServer((_req, res) => {
      finish = () => res.end('finished')
      arrive()
    })
    servers.push(slow)

    const gateway = create({
      server: { hostname: '127.0.0.1', shutdownGracePeriod: 5000 },
      routes: [{ pathPrefix: '/', targets: [{ url: slow.url }] }],
    })
    const url = await listen(gateway)

    const pending = get(`${url}/`)
    await arrived
    const closing = gateway.close()
    expect(gateway.getStats().inFlight).toBe(1)

    finish()
    expect((await pending).body).toBe('finished')
    await closing
    expect(gateway.getStats().inFlight).toBe(0)
  })
})
