/**
 * Concurrency scope an admission slot is taken from
 */
export type AdmissionScope =
  | { kind: 'global' }
  | {
      kind: 'route'
      routeId: string
      /** Ceiling for the route, 0 for unlimited */
      limit: number
    }

export interface AdmissionConfig {
  /**
   * Global ceiling of in-flight requests
   * @default 1024
   */
  maxConcurrent?: number

  /**
   * Waiters allowed per scope before new requests are shed immediately
   * @default 1024
   */
  maxQueue?: number

  /**
   * Longest time a request waits for admission in milliseconds
   * @default 1000
   */
  maxWait?: number
}

export interface AdmissionScopeStats {
  scope: string
  limit: number
  active: number
  queued: number
  rejected: number
}
