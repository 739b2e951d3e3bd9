/**
 * Error Responder
 *
 * Turns a GatewayError into the JSON error response sent to the client.
 * In production mode messages are generic so that upstream addresses and
 * internal details never reach clients; in development the error message is
 * passed through.
 *
 * Body shape:
 * ```json
 * { "error": { "code": "UPSTREAM_TIMEOUT", "message": "...", "requestId": "...", "timestamp": 1700000000000 } }
 * ```
 */
import type { ServerResponse } from 'node:http'
import type { ErrorResponseConfig } from '../interfaces/forwarding'
import type { GatewayError } from './gateway-errors'

/**
 * Default error messages for the statuses the gateway produces
 */
const DEFAULT_ERROR_MESSAGES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
}

export interface ErrorBody {
  error: {
    code: string
    message: string
    requestId: string
    timestamp: number
  }
}

export class ErrorResponder {
  private production: boolean
  private customMessages: Record<number, string>

  constructor(config: ErrorResponseConfig = {}) {
    this.production =
      config.production ?? process.env.NODE_ENV === 'production'
    this.customMessages = config.customMessages ?? {}
  }

  /**
   * Builds the client-facing body for an error
   */
  toBody(error: GatewayError, requestId: string): ErrorBody {
    return {
      error: {
        code: error.code,
        message: this.production
          ? this.getGenericMessage(error.statusCode)
          : error.message,
        requestId,
        timestamp: Date.now(),
      },
    }
  }

  /**
   * Writes the error response
   *
   * @returns false when the response had already started and nothing was
   * written
   */
  send(res: ServerResponse, error: GatewayError, requestId: string): boolean {
    if (res.headersSent || res.writableEnded || res.destroyed) {
      return false
    }

    const payload = JSON.stringify(this.toBody(error, requestId))
    res.statusCode = error.statusCode
    res.setHeader('Content-Type', 'application/json')
    res.setHeader('Content-Length', Buffer.byteLength(payload))
    res.setHeader('X-Request-ID', requestId)
    if (error.code === 'ADMISSION_REJECTED') {
      res.setHeader('Retry-After', '1')
    }
    res.end(payload)
    return true
  }

  private getGenericMessage(statusCode: number): string {
    return (
      this.customMessages[statusCode] ??
      DEFAULT_ERROR_MESSAGES[statusCode] ??
      'An error occurred while processing your request'
    )
  }
}
