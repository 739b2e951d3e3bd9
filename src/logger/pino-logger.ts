/**
 * Pino Logger Implementation for httpgate
 *
 * Structured logging built on Pino with gateway-specific helpers for request
 * outcomes, circuit transitions and balancing decisions.
 *
 * Features:
 * - JSON logging by default, pino-pretty for local development
 * - Redaction of credentials both by Pino paths and by recursive sanitizing
 * - Child loggers per component
 * - File output through the pino/file transport
 *
 * @example
 * ```ts
 * const logger = new GateLogger({ level: 'info' })
 *
 * logger.info('Gateway started', { port: 8080 })
 * logger.child({ component: 'UpstreamPool' }).debug('Connection created')
 * ```
 */
import pino from 'pino'
import type { LoggerOptions, Logger as PinoLogger } from 'pino'
import type { HealthTransitionEvent } from '../interfaces/health'
import type { RequestOutcomeEvent } from '../interfaces/forwarding'
import type { LogLevel, Logger, LoggerConfig } from '../interfaces/logger'

const REDACT_PATHS = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers.cookie',
  'headers["x-api-key"]',
  'headers["proxy-authorization"]',
  'token',
  'accessToken',
  'refreshToken',
  '*.token',
  'password',
  'secret',
  'privateKey',
  '*.password',
  '*.secret',
]

const SENSITIVE_KEYS = [
  'apikey',
  'api_key',
  'x-api-key',
  'authorization',
  'cookie',
  'token',
  'password',
  'passwd',
  'secret',
  'privatekey',
  'private_key',
]

const SENSITIVE_MESSAGE_PATTERNS = [
  /\bBearer\s+[^\s,}\]]+/gi,
  /\b(api[_-]?key|apikey)[\s:=]+[^\s,}\]]+/gi,
  /\b(token|access[_-]?token|refresh[_-]?token)[\s:=]+[^\s,}\]]+/gi,
  /\b(password|passwd|secret)[\s:=]+[^\s,}\]]+/gi,
]

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Gateway logger backed by Pino
 */
export class GateLogger implements Logger {
  /** Direct access to underlying Pino logger for advanced usage */
  readonly pino: PinoLogger
  private config: LoggerConfig

  constructor(config: LoggerConfig = {}, instance?: PinoLogger) {
    this.config = {
      level: 'info',
      format: 'json',
      enableRequestLogging: true,
      enableMetrics: true,
      ...config,
    }

    if (instance) {
      this.pino = instance
      return
    }

    const {
      format,
      output,
      filePath,
      enableRequestLogging: _requestLogging,
      enableMetrics: _metrics,
      level,
      ...pinoOptions
    } = this.config

    const pinoConfig: LoggerOptions = {
      ...pinoOptions,
      level: level ?? 'info',
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
    }

    if (format === 'pretty') {
      pinoConfig.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    }

    if (output === 'file' && filePath) {
      pinoConfig.transport = {
        target: 'pino/file',
        options: { destination: filePath, mkdir: true },
      }
    }

    this.pino = pino(pinoConfig)
  }

  /**
   * Replaces values of sensitive keys, recursing into nested objects
   */
  sanitizeData(data: object): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()
      if (SENSITIVE_KEYS.some((pattern) => lowerKey.includes(pattern))) {
        sanitized[key] = '[REDACTED]'
      } else {
        sanitized[key] = this.sanitizeValue(value)
      }
    }
    return sanitized
  }

  private sanitizeValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitizeValue(item))
    }
    if (isPlainObject(value) && !(value instanceof Error)) {
      return this.sanitizeData(value)
    }
    return value
  }

  sanitizeMessage(message: string | undefined): string | undefined {
    if (!message) {
      return message
    }

    let sanitized = message
    for (const pattern of SENSITIVE_MESSAGE_PATTERNS) {
      sanitized = sanitized.replace(pattern, (match) => {
        const separator = match.search(/[\s:=]/)
        return separator === -1
          ? '[REDACTED]'
          : `${match.substring(0, separator + 1)}[REDACTED]`
      })
    }
    return sanitized
  }

  private write(
    level: 'info' | 'debug' | 'warn',
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    if (typeof msgOrObj === 'string') {
      const data = typeof dataOrMsg === 'object' ? dataOrMsg : {}
      this.pino[level](
        this.sanitizeData(data),
        this.sanitizeMessage(msgOrObj),
      )
    } else {
      const message = typeof dataOrMsg === 'string' ? dataOrMsg : undefined
      this.pino[level](
        this.sanitizeData(msgOrObj),
        this.sanitizeMessage(message),
      )
    }
  }

  info(message: string, data?: Record<string, unknown>): void
  info(obj: object, message?: string): void
  info(
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    this.write('info', msgOrObj, dataOrMsg)
  }

  debug(message: string, data?: Record<string, unknown>): void
  debug(obj: object, message?: string): void
  debug(
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    this.write('debug', msgOrObj, dataOrMsg)
  }

  warn(message: string, data?: Record<string, unknown>): void
  warn(obj: object, message?: string): void
  warn(
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    this.write('warn', msgOrObj, dataOrMsg)
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void
  error(obj: object, message?: string): void
  error(
    msgOrObj: string | object,
    errorOrMsg?: Error | string,
    data?: Record<string, unknown>,
  ): void {
    if (typeof msgOrObj === 'string') {
      const errorData = {
        ...data,
        ...(errorOrMsg instanceof Error
          ? {
              error: {
                name: errorOrMsg.name,
                message: errorOrMsg.message,
                stack: errorOrMsg.stack,
              },
            }
          : {}),
      }
      this.pino.error(
        this.sanitizeData(errorData),
        this.sanitizeMessage(msgOrObj),
      )
    } else {
      const message = typeof errorOrMsg === 'string' ? errorOrMsg : undefined
      this.pino.error(
        this.sanitizeData(msgOrObj),
        this.sanitizeMessage(message),
      )
    }
  }

  logRequestOutcome(event: RequestOutcomeEvent): void {
    if (!this.config.enableRequestLogging) return

    const data = {
      request: {
        id: event.requestId,
        method: event.method,
        host: event.host,
        path: event.path,
      },
      route: event.routeId,
      target: event.target,
      response: {
        status: event.status,
        outcome: event.outcome,
        latency: event.latencyMs,
      },
      attempts: event.attempts,
      retries: event.retries,
      ...(event.error ? { errorCode: event.error.code } : {}),
    }
    const message = `${event.method} ${event.path} ${event.status} ${event.outcome}`

    if (event.outcome === 'success') {
      this.pino.info(data, message)
    } else if (
      event.outcome === 'no-route' ||
      event.outcome === 'client-disconnected'
    ) {
      this.pino.debug(data, message)
    } else {
      this.pino.warn(data, message)
    }
  }

  logCircuitTransition(event: HealthTransitionEvent): void {
    const data = {
      circuit: {
        target: event.target,
        from: event.from,
        to: event.to,
        consecutiveFailures: event.consecutiveFailures,
        cooldown: event.cooldownMs,
      },
    }
    const message = `Circuit for ${event.target}: ${event.from} -> ${event.to}`

    if (event.to === 'open') {
      this.pino.warn(data, message)
    } else {
      this.pino.info(data, message)
    }
  }

  logLoadBalancing(
    strategy: string,
    targetUrl: string,
    metadata?: Record<string, unknown>,
  ): void {
    this.pino.debug(
      {
        loadBalancer: {
          strategy,
          selectedTarget: targetUrl,
          ...metadata,
        },
      },
      `Load balancer selected target using ${strategy} strategy`,
    )
  }

  logMetrics(
    component: string,
    operation: string,
    duration: number,
    metadata?: Record<string, unknown>,
  ): void {
    if (!this.config.enableMetrics) return

    this.pino.debug(
      {
        metrics: {
          component,
          operation,
          duration,
          ...metadata,
        },
      },
      `${component}.${operation} completed in ${duration}ms`,
    )
  }

  child(context: Record<string, unknown>): Logger {
    return new GateLogger(this.config, this.pino.child(context))
  }

  setLevel(level: LogLevel): void {
    this.pino.level = level
    this.config.level = level
  }

  getLevel(): LogLevel {
    return this.config.level ?? 'info'
  }
}

/**
 * Factory function to create a logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new GateLogger(config)
}

/**
 * Default logger instance used when a component is built without one
 */
export const defaultLogger = createLogger({ level: 'info' })
