import type { GatewayErrorCode } from '../errors/gateway-errors'
import type { HealthTransitionEvent } from './health'

/**
 * Terminal classification of one inbound request
 */
export type RequestOutcomeKind =
  | 'success'
  | 'no-route'
  | 'rejected'
  | 'pool-exhausted'
  | 'unreachable'
  | 'timeout'
  | 'client-disconnected'
  | 'partial-response'
  | 'error'

/**
 * Emitted once per inbound request after every resource it held is released
 */
export interface RequestOutcomeEvent {
  requestId: string
  method: string
  path: string
  host: string
  /** Matched route id, null when no route matched */
  routeId: string | null
  /** Target of the last attempt, null when none was made */
  target: string | null
  /** Status sent to the client, or the event status of a silent failure */
  status: number
  outcome: RequestOutcomeKind
  latencyMs: number
  /** Attempts beyond the first */
  retries: number
  attempts: number
  error?: { code: GatewayErrorCode; message: string }
}

export type RequestOutcome = RequestOutcomeEvent

export interface ForwardingConfig {
  /**
   * Request bodies up to this size (by content-length) are buffered and can
   * be replayed on retry; larger or chunked bodies are streamed
   * @default 65536
   */
  maxBufferedBodyBytes?: number

  /**
   * Upstream statuses relayed to the client but recorded as health failures
   * @default [502, 503, 504]
   */
  failureStatusCodes?: number[]
}

export interface ErrorResponseConfig {
  /**
   * Use generic messages instead of error messages in responses
   * @default process.env.NODE_ENV === 'production'
   */
  production?: boolean

  /**
   * Messages per status code used in production mode
   * @example { 503: 'Please retry shortly' }
   */
  customMessages?: Record<number, string>
}

/**
 * Observability callbacks; exceptions thrown here are logged and ignored
 */
export interface GatewayHooks {
  onRequestOutcome?: (event: RequestOutcomeEvent) => void
  onHealthTransition?: (event: HealthTransitionEvent) => void
}
