/**
 * HTTP Load Balancer
 *
 * Orders a route's candidate targets into an attempt plan. The first entry
 * receives the request; later entries are used, in order, by retries. The
 * plan has `1 + retries` entries and cycles through the candidates when the
 * budget is larger than the candidate list.
 *
 * Strategies:
 * - failover: list order, first healthy target first; when the route is
 *   degraded the starting point rotates so that every target is tried in turn
 * - round-robin: starting point rotates per route on every request
 * - weighted: weighted random start, then list order
 * - random: uniform random start, then list order
 * - least-connections: fewest in-use pooled connections first, ties in
 *   list order
 *
 * @example
 * ```ts
 * const balancer = new HttpLoadBalancer({ connections: (t) => pool.inUseCount(t) })
 * const plan = balancer.plan(route, candidates, degraded)
 * for (const target of plan.targets) {
 *   // attempt target, stop on success
 * }
 * ```
 */
import type {
  AttemptPlan,
  LoadBalancerOptions,
  LoadBalancerStats,
} from '../interfaces/load-balancer'
import type { Logger } from '../interfaces/logger'
import type {
  BalancingStrategy,
  Route,
  UpstreamTarget,
} from '../interfaces/route'
import { defaultLogger } from '../logger/pino-logger'

export class HttpLoadBalancer {
  private logger: Logger
  private connections: (target: UpstreamTarget) => number
  private random: () => number
  /** Rotation counters per route id */
  private cursors = new Map<string, number>()
  private totalPlans = 0
  private selections = new Map<string, number>()

  constructor(options: LoadBalancerOptions = {}) {
    this.logger = options.logger ?? defaultLogger
    this.connections = options.connections ?? (() => 0)
    this.random = options.random ?? Math.random
  }

  /**
   * Build the attempt plan for one request
   *
   * @param candidates - Non-empty, as returned by route resolution
   * @param degraded - Every target was ineligible and is tried anyway
   */
  plan(
    route: Route,
    candidates: readonly UpstreamTarget[],
    degraded: boolean,
  ): AttemptPlan {
    const order = this.order(route, candidates, degraded)
    const attempts = 1 + route.policy.retries
    const targets: UpstreamTarget[] = []
    for (let i = 0; i < attempts && order.length > 0; i++) {
      const target = order[i % order.length]
      if (target) targets.push(target)
    }

    const first = targets[0]
    if (first) {
      this.totalPlans++
      this.selections.set(first.url, (this.selections.get(first.url) ?? 0) + 1)
      this.logger.logLoadBalancing(route.policy.strategy, first.url, {
        route: route.id,
        candidates: candidates.length,
        attempts: targets.length,
        degraded,
      })
    }

    return { strategy: route.policy.strategy, targets }
  }

  getStats(): LoadBalancerStats {
    return {
      totalPlans: this.totalPlans,
      selections: Object.fromEntries(this.selections),
    }
  }

  /**
   * Drop rotation state of routes that are no longer published
   */
  prune(routeIds: ReadonlySet<string>): void {
    for (const id of this.cursors.keys()) {
      if (!routeIds.has(id)) this.cursors.delete(id)
    }
  }

  private order(
    route: Route,
    candidates: readonly UpstreamTarget[],
    degraded: boolean,
  ): UpstreamTarget[] {
    if (candidates.length <= 1) {
      return [...candidates]
    }

    const strategy: BalancingStrategy = route.policy.strategy
    switch (strategy) {
      case 'failover':
        return degraded
          ? rotate(candidates, this.nextCursor(route.id, candidates.length))
          : [...candidates]
      case 'round-robin':
        return rotate(candidates, this.nextCursor(route.id, candidates.length))
      case 'weighted':
        return rotate(candidates, this.selectWeighted(candidates))
      case 'random':
        return rotate(
          candidates,
          Math.floor(this.random() * candidates.length) % candidates.length,
        )
      case 'least-connections':
        return this.byLeastConnections(candidates)
    }
  }

  private nextCursor(routeId: string, length: number): number {
    const cursor = this.cursors.get(routeId) ?? 0
    this.cursors.set(routeId, (cursor + 1) % Number.MAX_SAFE_INTEGER)
    return cursor % length
  }

  private selectWeighted(candidates: readonly UpstreamTarget[]): number {
    const totalWeight = candidates.reduce(
      (sum, target) => sum + target.weight,
      0,
    )
    let random = this.random() * totalWeight

    for (let i = 0; i < candidates.length; i++) {
      const target = candidates[i]
      if (!target) continue
      random -= target.weight
      if (random < 0) {
        return i
      }
    }

    return candidates.length - 1
  }

  private byLeastConnections(
    candidates: readonly UpstreamTarget[],
  ): UpstreamTarget[] {
    return candidates
      .map((target, index) => ({
        target,
        index,
        connections: this.connections(target),
      }))
      .sort((a, b) => a.connections - b.connections || a.index - b.index)
      .map((entry) => entry.target)
  }
}

function rotate(
  targets: readonly UpstreamTarget[],
  start: number,
): UpstreamTarget[] {
  return [...targets.slice(start), ...targets.slice(0, start)]
}

/**
 * Factory function to create a load balancer
 */
export function createLoadBalancer(
  options?: LoadBalancerOptions,
): HttpLoadBalancer {
  return new HttpLoadBalancer(options)
}
