/**
 * Tests for the attempt planning load balancer
 */
import { describe, test, expect } from 'vitest'
import {
  HttpLoadBalancer,
  createLoadBalancer,
} from '../../src/load-balancer/http-load-balancer'
import type {
  BalancingStrategy,
  UpstreamTarget,
} from '../../src/interfaces/route'
import { route, silentLogger } from '../helpers'

const targets = [
  { url: 'http://server1.test' },
  { url: 'http://server2.test', weight: 2 },
  { url: 'http://server3.test' },
]

function routeWith(strategy: BalancingStrategy, retries = 2) {
  return route({ id: `lb-${strategy}`, targets, strategy, retries })
}

const urls = (list: readonly UpstreamTarget[]) => list.map((t) => t.url)

describe('HttpLoadBalancer', () => {
  test('failover keeps list order', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = routeWith('failover')

    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://server1.test',
      'http://server2.test',
      'http://server3.test',
    ])
    expect(urls(balancer.plan(r, r.targets, false).targets)[0]).toBe(
      'http://server1.test',
    )
  })

  test('failover skips targets missing from the candidates', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = routeWith('failover', 1)
    const candidates = r.targets.slice(1)

    expect(urls(balancer.plan(r, candidates, false).targets)).toEqual([
      'http://server2.test',
      'http://server3.test',
    ])
  })

  test('degraded failover rotates the starting target', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = routeWith('failover', 0)

    const firsts = [0, 1, 2, 3].map(
      () => balancer.plan(r, r.targets, true).targets[0]?.url,
    )
    expect(firsts).toEqual([
      'http://server1.test',
      'http://server2.test',
      'http://server3.test',
      'http://server1.test',
    ])
  })

  test('round-robin rotates per route', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = routeWith('round-robin', 1)

    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://server1.test',
      'http://server2.test',
    ])
    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://server2.test',
      'http://server3.test',
    ])
    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://server3.test',
      'http://server1.test',
    ])
  })

  test('the plan cycles when retries exceed the candidates', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = route({
      targets: [{ url: 'http://a.test' }, { url: 'http://b.test' }],
      retries: 4,
    })

    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://a.test',
      'http://b.test',
      'http://a.test',
      'http://b.test',
      'http://a.test',
    ])
  })

  test('weighted picks the start by weight', () => {
    // total weight 4: [0,1) server1, [1,3) server2, [3,4) server3
    const picks = [0.1, 0.3, 0.7, 0.9]
    let call = 0
    const balancer = new HttpLoadBalancer({
      logger: silentLogger,
      random: () => picks[call++] ?? 0,
    })
    const r = routeWith('weighted', 0)

    const firsts = picks.map(
      () => balancer.plan(r, r.targets, false).targets[0]?.url,
    )
    expect(firsts).toEqual([
      'http://server1.test',
      'http://server2.test',
      'http://server2.test',
      'http://server3.test',
    ])
  })

  test('random starts at a uniform index and continues in order', () => {
    const balancer = new HttpLoadBalancer({
      logger: silentLogger,
      random: () => 0.5,
    })
    const r = routeWith('random')

    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://server2.test',
      'http://server3.test',
      'http://server1.test',
    ])
  })

  test('least-connections orders by in-use connections, ties in list order', () => {
    const inUse: Record<string, number> = {
      'http://server1.test': 4,
      'http://server2.test': 1,
      'http://server3.test': 1,
    }
    const balancer = new HttpLoadBalancer({
      logger: silentLogger,
      connections: (t) => inUse[t.url] ?? 0,
    })
    const r = routeWith('least-connections')

    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://server2.test',
      'http://server3.test',
      'http://server1.test',
    ])
  })

  test('a single candidate is retried against itself', () => {
    const balancer = createLoadBalancer({ logger: silentLogger })
    const r = route({ strategy: 'round-robin', retries: 2 })

    expect(urls(balancer.plan(r, r.targets, false).targets)).toEqual([
      'http://a.test:3000',
      'http://a.test:3000',
      'http://a.test:3000',
    ])
  })

  test('tracks first-choice selections', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = routeWith('round-robin', 0)
    for (let i = 0; i < 4; i++) {
      balancer.plan(r, r.targets, false)
    }

    expect(balancer.getStats()).toEqual({
      totalPlans: 4,
      selections: {
        'http://server1.test': 2,
        'http://server2.test': 1,
        'http://server3.test': 1,
      },
    })
  })

  test('prune resets rotation for removed routes', () => {
    const balancer = new HttpLoadBalancer({ logger: silentLogger })
    const r = routeWith('round-robin', 0)
    balancer.plan(r, r.targets, false)

    balancer.prune(new Set())
    expect(balancer.plan(r, r.targets, false).targets[0]?.url).toBe(
      'http://server1.test',
    )
  })
})
