/**
 * Health/Circuit Tracker
 *
 * Per-target circuit breaker fed by forwarding outcomes. Targets are keyed by
 * origin, so every route pointing at the same host shares one circuit.
 *
 * ```
 *   closed --(threshold failures in window)--> open
 *   open   --(cool-down elapsed, on read)----> half-open
 *   half-open --(probe success)--> closed
 *   half-open --(probe failure)--> open (cool-down x backoffMultiplier)
 * ```
 *
 * Only this class changes circuit state. Callers ask for a permit before an
 * attempt and report the outcome with that permit.
 *
 * At most `maxTrackedTargets` circuits are kept once idle ones can be
 * evicted; an evicted target starts again closed with fresh counters.
 *
 * @example
 * ```ts
 * const tracker = new CircuitTracker({ failureThreshold: 3, cooldown: 10000 })
 * const permit = tracker.tryAcquire(target, false)
 * if (permit) {
 *   try {
 *     await send()
 *     tracker.recordSuccess(target, permit, latency)
 *   } catch (error) {
 *     tracker.recordFailure(target, permit, error)
 *   }
 * }
 * ```
 */
import type {
  CircuitBreakerConfig,
  CircuitPermit,
  CircuitState,
  HealthTransitionEvent,
  TargetHealthSnapshot,
} from '../interfaces/health'
import type { Logger } from '../interfaces/logger'
import type { UpstreamTarget } from '../interfaces/route'
import { defaultLogger } from '../logger/pino-logger'

export const DEFAULT_CIRCUIT_CONFIG: Required<CircuitBreakerConfig> = {
  failureThreshold: 5,
  windowMs: 10000,
  cooldown: 30000,
  backoffMultiplier: 2,
  maxCooldown: 300000,
  maxTrackedTargets: 1024,
}

interface Circuit {
  key: string
  state: CircuitState
  /** Timestamps of the current run of consecutive failures */
  failureTimes: number[]
  cooldownMs: number
  openedAt: number | null
  probeInFlight: boolean
  successes: number
  failures: number
  totalLatency: number
}

export interface CircuitTrackerOptions extends CircuitBreakerConfig {
  logger?: Logger
  onTransition?: (event: HealthTransitionEvent) => void
}

export class CircuitTracker {
  private config: Required<CircuitBreakerConfig>
  private circuits = new Map<string, Circuit>()
  private logger: Logger
  private onTransition?: (event: HealthTransitionEvent) => void

  constructor(options: CircuitTrackerOptions = {}) {
    const { logger, onTransition, ...config } = options
    this.config = { ...DEFAULT_CIRCUIT_CONFIG, ...config }
    this.logger = logger ?? defaultLogger
    this.onTransition = onTransition
  }

  /**
   * Whether the target may be offered to new requests
   */
  isEligible(target: UpstreamTarget): boolean {
    const circuit = this.refresh(this.getCircuit(target), Date.now())
    switch (circuit.state) {
      case 'closed':
        return true
      case 'half-open':
        return !circuit.probeInFlight
      case 'open':
        return false
    }
  }

  /**
   * Ask for permission to send one attempt to the target
   *
   * @param forced - The route is degraded and the target is tried anyway
   * @returns null when the attempt must not be made
   */
  tryAcquire(target: UpstreamTarget, forced: boolean): CircuitPermit | null {
    const circuit = this.refresh(this.getCircuit(target), Date.now())
    if (circuit.state === 'closed') {
      return 'normal'
    }
    if (circuit.state === 'half-open' && !circuit.probeInFlight && !forced) {
      circuit.probeInFlight = true
      return 'probe'
    }
    return forced ? 'forced' : null
  }

  recordSuccess(
    target: UpstreamTarget,
    permit: CircuitPermit,
    latencyMs: number,
  ): void {
    const circuit = this.getCircuit(target)
    circuit.successes++
    circuit.totalLatency += latencyMs

    if (permit === 'probe') {
      circuit.probeInFlight = false
      this.close(circuit, Date.now())
    } else if (permit === 'forced' && circuit.state !== 'closed') {
      this.close(circuit, Date.now())
    } else if (circuit.state === 'closed') {
      circuit.failureTimes = []
    }
  }

  recordFailure(
    target: UpstreamTarget,
    permit: CircuitPermit,
    error: unknown,
  ): void {
    const circuit = this.getCircuit(target)
    const now = Date.now()
    circuit.failures++

    this.logger.debug('Upstream failure recorded', {
      target: circuit.key,
      permit,
      state: circuit.state,
      error: error instanceof Error ? error.message : String(error),
    })

    if (permit === 'probe') {
      circuit.probeInFlight = false
      circuit.failureTimes.push(now)
      this.open(
        circuit,
        now,
        Math.min(
          circuit.cooldownMs * this.config.backoffMultiplier,
          this.config.maxCooldown,
        ),
      )
      return
    }

    if (permit === 'forced' || circuit.state !== 'closed') {
      return
    }

    circuit.failureTimes = circuit.failureTimes.filter(
      (time) => now - time < this.config.windowMs,
    )
    circuit.failureTimes.push(now)
    if (circuit.failureTimes.length >= this.config.failureThreshold) {
      this.open(circuit, now, this.config.cooldown)
    }
  }

  /**
   * Give a permit back without an outcome, for example when the client went
   * away mid-attempt; an abandoned probe frees the half-open trial slot
   */
  releasePermit(target: UpstreamTarget, permit: CircuitPermit): void {
    if (permit !== 'probe') return
    const circuit = this.getCircuit(target)
    circuit.probeInFlight = false
  }

  getState(target: UpstreamTarget): CircuitState {
    return this.refresh(this.getCircuit(target), Date.now()).state
  }

  getSnapshot(): TargetHealthSnapshot[] {
    const now = Date.now()
    return [...this.circuits.values()].map((entry) => {
      const circuit = this.refresh(entry, now)
      return {
        target: circuit.key,
        state: circuit.state,
        consecutiveFailures: circuit.failureTimes.length,
        cooldownMs: circuit.cooldownMs,
        openedAt: circuit.openedAt,
        probeInFlight: circuit.probeInFlight,
        successes: circuit.successes,
        failures: circuit.failures,
        averageLatencyMs:
          circuit.successes > 0 ? circuit.totalLatency / circuit.successes : 0,
      }
    })
  }

  private getCircuit(target: UpstreamTarget): Circuit {
    let circuit = this.circuits.get(target.origin)
    if (!circuit) {
      if (this.circuits.size >= this.config.maxTrackedTargets) {
        this.evictIdle(Date.now())
      }
      circuit = {
        key: target.origin,
        state: 'closed',
        failureTimes: [],
        cooldownMs: this.config.cooldown,
        openedAt: null,
        probeInFlight: false,
        successes: 0,
        failures: 0,
        totalLatency: 0,
      }
      this.circuits.set(target.origin, circuit)
    }
    return circuit
  }

  private evictIdle(now: number): void {
    for (const [key, circuit] of this.circuits) {
      if (circuit.probeInFlight) continue
      const idle =
        circuit.state === 'half-open' ||
        (circuit.state === 'open' &&
          circuit.openedAt !== null &&
          now - circuit.openedAt >= circuit.cooldownMs) ||
        (circuit.state === 'closed' &&
          circuit.failureTimes.every(
            (time) => now - time >= this.config.windowMs,
          ))
      if (idle) {
        this.circuits.delete(key)
      }
    }
    this.logger.debug('Evicted idle circuits', {
      remaining: this.circuits.size,
      limit: this.config.maxTrackedTargets,
    })
  }

  /**
   * Moves an open circuit to half-open once its cool-down has elapsed
   */
  private refresh(circuit: Circuit, now: number): Circuit {
    if (
      circuit.state === 'open' &&
      circuit.openedAt !== null &&
      now - circuit.openedAt >= circuit.cooldownMs
    ) {
      circuit.probeInFlight = false
      this.transition(circuit, 'half-open', now)
    }
    return circuit
  }

  private open(circuit: Circuit, now: number, cooldownMs: number): void {
    circuit.cooldownMs = cooldownMs
    circuit.openedAt = now
    this.transition(circuit, 'open', now)
  }

  private close(circuit: Circuit, now: number): void {
    circuit.failureTimes = []
    circuit.cooldownMs = this.config.cooldown
    circuit.openedAt = null
    circuit.probeInFlight = false
    this.transition(circuit, 'closed', now)
  }

  private transition(circuit: Circuit, to: CircuitState, now: number): void {
    const from = circuit.state
    circuit.state = to
    if (from === to) return

    const event: HealthTransitionEvent = {
      target: circuit.key,
      from,
      to,
      consecutiveFailures: circuit.failureTimes.length,
      cooldownMs: circuit.cooldownMs,
      at: now,
    }
    this.logger.logCircuitTransition(event)

    if (!this.onTransition) return
    try {
      this.onTransition(event)
    } catch (error) {
      this.logger.error('Health transition hook failed', toError(error), {
        target: circuit.key,
      })
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
