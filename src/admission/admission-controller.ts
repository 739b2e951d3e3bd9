/**
 * Admission Controller
 *
 * Bounds in-flight requests globally and per route. A request over the
 * ceiling waits in a FIFO queue until capacity frees or its admission
 * deadline passes; the queue itself is bounded, and arrivals past that bound
 * are shed at once.
 *
 * @example
 * ```ts
 * const admission = new AdmissionController({ maxConcurrent: 512, maxWait: 250 })
 * const slot = await admission.acquire({ kind: 'global' }, Date.now() + 1000)
 * try {
 *   // ... forward
 * } finally {
 *   slot.release()
 * }
 * ```
 */
import { AdmissionRejectedError } from '../errors/gateway-errors'
import type {
  AdmissionConfig,
  AdmissionScope,
  AdmissionScopeStats,
} from '../interfaces/admission'
import type { Logger } from '../interfaces/logger'
import { defaultLogger } from '../logger/pino-logger'

export const DEFAULT_ADMISSION_CONFIG: Required<AdmissionConfig> = {
  maxConcurrent: 1024,
  maxQueue: 1024,
  maxWait: 1000,
}

interface Waiter {
  grant: () => void
  cleanup: () => void
}

interface ScopeState {
  key: string
  /** 0 means unlimited */
  limit: number
  active: number
  queue: Waiter[]
  rejected: number
}

/**
 * One unit of capacity in one scope; release is idempotent
 */
export class AdmissionSlot {
  private released = false

  constructor(
    readonly scope: string,
    private readonly onRelease: () => void,
  ) {}

  get isReleased(): boolean {
    return this.released
  }

  release(): void {
    if (this.released) return
    this.released = true
    this.onRelease()
  }
}

function scopeKey(scope: AdmissionScope): string {
  return scope.kind === 'global' ? 'global' : `route:${scope.routeId}`
}

export class AdmissionController {
  private config: Required<AdmissionConfig>
  private scopes = new Map<string, ScopeState>()
  private logger: Logger

  constructor(config: AdmissionConfig = {}, logger?: Logger) {
    this.config = { ...DEFAULT_ADMISSION_CONFIG, ...config }
    this.logger = logger ?? defaultLogger
  }

  /**
   * Take one slot in the scope
   *
   * The wait is bounded by `min(deadline, now + maxWait)`.
   *
   * @throws AdmissionRejectedError when the queue is full or the wait expires
   * @throws the abort reason when the signal aborts while waiting
   */
  async acquire(
    scope: AdmissionScope,
    deadline: number,
    signal?: AbortSignal,
  ): Promise<AdmissionSlot> {
    signal?.throwIfAborted()
    const state = this.getState(scope)

    if (this.hasCapacity(state) && state.queue.length === 0) {
      return this.grant(state)
    }

    if (state.queue.length >= this.config.maxQueue) {
      state.rejected++
      this.logger.warn('Admission queue full, shedding request', {
        scope: state.key,
        limit: state.limit,
        queued: state.queue.length,
      })
      throw new AdmissionRejectedError(state.key, 'queue-full')
    }

    const now = Date.now()
    const remaining = Math.min(deadline, now + this.config.maxWait) - now
    if (remaining <= 0) {
      state.rejected++
      throw new AdmissionRejectedError(state.key, 'deadline')
    }

    return new Promise<AdmissionSlot>((resolve, reject) => {
      const remove = () => {
        const index = state.queue.indexOf(waiter)
        if (index !== -1) state.queue.splice(index, 1)
        waiter.cleanup()
        this.forgetIfIdle(state)
      }
      const onAbort = () => {
        remove()
        reject(signal?.reason)
      }
      const timer = setTimeout(() => {
        remove()
        state.rejected++
        reject(new AdmissionRejectedError(state.key, 'deadline'))
      }, remaining)

      const waiter: Waiter = {
        grant: () => resolve(this.grant(state)),
        cleanup: () => {
          clearTimeout(timer)
          signal?.removeEventListener('abort', onAbort)
        },
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      state.queue.push(waiter)
    })
  }

  release(slot: AdmissionSlot): void {
    slot.release()
  }

  /**
   * Requests currently holding a global slot
   */
  get inFlight(): number {
    return this.scopes.get('global')?.active ?? 0
  }

  getStats(): AdmissionScopeStats[] {
    return [...this.scopes.values()].map((state) => ({
      scope: state.key,
      limit: state.limit,
      active: state.active,
      queued: state.queue.length,
      rejected: state.rejected,
    }))
  }

  private getState(scope: AdmissionScope): ScopeState {
    const key = scopeKey(scope)
    const limit =
      scope.kind === 'global' ? this.config.maxConcurrent : scope.limit
    let state = this.scopes.get(key)
    if (!state) {
      state = { key, limit, active: 0, queue: [], rejected: 0 }
      this.scopes.set(key, state)
    } else if (state.limit !== limit) {
      // a reload changed the route ceiling
      state.limit = limit
      this.drain(state)
    }
    return state
  }

  private hasCapacity(state: ScopeState): boolean {
    return state.limit === 0 || state.active < state.limit
  }

  private grant(state: ScopeState): AdmissionSlot {
    state.active++
    return new AdmissionSlot(state.key, () => {
      state.active--
      this.drain(state)
      this.forgetIfIdle(state)
    })
  }

  /**
   * Route scopes exist only while a request holds or waits for a slot
   */
  private forgetIfIdle(state: ScopeState): void {
    if (state.key === 'global') return
    if (state.active > 0 || state.queue.length > 0) return
    if (this.scopes.get(state.key) === state) {
      this.scopes.delete(state.key)
    }
  }

  private drain(state: ScopeState): void {
    while (this.hasCapacity(state)) {
      const waiter = state.queue.shift()
      if (!waiter) return
      waiter.cleanup()
      waiter.grant()
    }
  }
}
