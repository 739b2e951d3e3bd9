import type {
  Logger as PinoLogger,
  LoggerOptions as PinoLoggerOptions,
} from 'pino'
import type { HealthTransitionEvent } from './health'
import type { RequestOutcomeEvent } from './forwarding'

/**
 * Log severity levels understood by the gateway logger
 */
export type LogLevel =
  | 'trace'
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'fatal'
  | 'silent'

/**
 * Logger configuration extending Pino logger options
 * Provides gateway-specific logging features and customization
 */
export interface LoggerConfig extends Omit<Partial<PinoLoggerOptions>, 'level'> {
  /**
   * Minimum log level to output
   * @default 'info'
   */
  level?: LogLevel

  /**
   * Log output format
   * - json: Structured JSON format for production
   * - pretty: Human-readable format for development (pino-pretty)
   * @default 'json'
   */
  format?: 'json' | 'pretty'

  /**
   * Log output destination
   * @default 'console'
   */
  output?: 'console' | 'file'

  /**
   * File path for file-based logging
   * Required when output is 'file'
   */
  filePath?: string

  /**
   * Log one line per forwarded request
   * @default true
   */
  enableRequestLogging?: boolean

  /**
   * Log pool acquire waits and upstream latency per attempt, at debug
   * @default true
   */
  enableMetrics?: boolean
}

/**
 * Gateway logger interface
 * Structured logging with request outcome, circuit and balancing events
 */
export interface Logger {
  /**
   * Access to the underlying Pino logger instance
   */
  readonly pino: PinoLogger

  info(message: string, data?: Record<string, unknown>): void
  info(obj: object, message?: string): void

  debug(message: string, data?: Record<string, unknown>): void
  debug(obj: object, message?: string): void

  warn(message: string, data?: Record<string, unknown>): void
  warn(obj: object, message?: string): void

  /**
   * Log error messages for failures and exceptions
   * @param message - Error message
   * @param error - Error object with stack trace
   * @param data - Additional error context
   */
  error(message: string, error?: Error, data?: Record<string, unknown>): void
  error(obj: object, message?: string): void

  /**
   * Log the outcome of one forwarded request
   * Called by the forwarding engine once per request when request logging is enabled
   */
  logRequestOutcome(event: RequestOutcomeEvent): void

  /**
   * Log a circuit breaker state transition for an upstream target
   */
  logCircuitTransition(event: HealthTransitionEvent): void

  /**
   * Log load balancer decisions
   */
  logLoadBalancing(
    strategy: string,
    targetUrl: string,
    metadata?: Record<string, unknown>,
  ): void

  /**
   * Log a timing at debug level
   * @example
   * ```ts
   * logger.logMetrics('pool', 'acquire', 12, { target: 'http://users:3000' })
   * ```
   */
  logMetrics(
    component: string,
    operation: string,
    duration: number,
    metadata?: Record<string, unknown>,
  ): void

  /**
   * Create a child logger with additional context
   * @example
   * ```ts
   * const poolLogger = logger.child({ component: 'UpstreamPool' })
   * poolLogger.debug('Connection created') // includes component
   * ```
   */
  child(context: Record<string, unknown>): Logger

  /**
   * Change the minimum log level at runtime
   */
  setLevel(level: LogLevel): void

  getLevel(): LogLevel
}
