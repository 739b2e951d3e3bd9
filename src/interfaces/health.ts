/**
 * Circuit state of an upstream target
 * - closed: healthy, receives traffic
 * - open: unhealthy, excluded from routing until the cool-down elapses
 * - half-open: one probe request decides between closed and open
 */
export type CircuitState = 'closed' | 'open' | 'half-open'

/**
 * Permission returned by the tracker for one attempt against a target
 * - normal: circuit closed
 * - probe: the single half-open trial
 * - forced: degraded route, target tried although not eligible
 */
export type CircuitPermit = 'normal' | 'probe' | 'forced'

export interface CircuitBreakerConfig {
  /**
   * Consecutive failures within the window that open the circuit
   * @default 5
   */
  failureThreshold?: number

  /**
   * Sliding window for counting consecutive failures in milliseconds
   * @default 10000
   */
  windowMs?: number

  /**
   * Base cool-down before an open circuit admits a probe in milliseconds
   * @default 30000
   */
  cooldown?: number

  /**
   * Cool-down multiplier applied each time a probe fails
   * @default 2
   */
  backoffMultiplier?: number

  /**
   * Upper bound for the cool-down in milliseconds
   * @default 300000
   */
  maxCooldown?: number

  /**
   * Circuits kept before idle ones (closed without recent failures, or
   * half-open without a probe) are evicted
   * @default 1024
   */
  maxTrackedTargets?: number
}

/**
 * Emitted on every circuit state change
 */
export interface HealthTransitionEvent {
  target: string
  from: CircuitState
  to: CircuitState
  consecutiveFailures: number
  cooldownMs: number
  at: number
}

export interface TargetHealthSnapshot {
  target: string
  state: CircuitState
  consecutiveFailures: number
  cooldownMs: number
  openedAt: number | null
  probeInFlight: boolean
  successes: number
  failures: number
  averageLatencyMs: number
}
