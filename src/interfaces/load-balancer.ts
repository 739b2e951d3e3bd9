import type { Logger } from './logger'
import type { BalancingStrategy, UpstreamTarget } from './route'

/**
 * Options for the attempt planner
 */
export interface LoadBalancerOptions {
  logger?: Logger

  /**
   * Connections currently in use for a target
   * Used by least-connections strategy
   * @default () => 0
   */
  connections?: (target: UpstreamTarget) => number

  /**
   * Random source in [0, 1), replaceable for deterministic tests
   * @default Math.random
   */
  random?: () => number
}

/**
 * Ordered targets for one request, one entry per allowed attempt
 */
export interface AttemptPlan {
  strategy: BalancingStrategy
  targets: UpstreamTarget[]
}

/**
 * Statistics about balancing decisions
 */
export interface LoadBalancerStats {
  /** Plans built since startup */
  totalPlans: number
  /** Times each target (by url) was first in a plan */
  selections: Record<string, number>
}
