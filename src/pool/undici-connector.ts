/**
 * Default transport: one undici Client, and so one socket, per pooled
 * connection. Pipelining stays at 1: a checked-out connection carries one
 * request at a time.
 */
import { Client } from 'undici'
import type { Dispatcher } from 'undici'
import type {
  PoolConfig,
  UpstreamConnector,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamTransport,
} from '../interfaces/pool'
import type { UpstreamTarget } from '../interfaces/route'

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return TOKEN.test(method)
}

export class UndiciConnector implements UpstreamConnector {
  private connectTimeout: number
  private keepAliveTimeout: number

  constructor(
    options: Pick<PoolConfig, 'connectTimeout' | 'keepAliveTimeout'> = {},
  ) {
    this.connectTimeout = options.connectTimeout ?? 5000
    this.keepAliveTimeout = options.keepAliveTimeout ?? 4000
  }

  connect(target: UpstreamTarget): UpstreamTransport {
    const client = new Client(target.origin, {
      pipelining: 1,
      connect: { timeout: this.connectTimeout },
      keepAliveTimeout: this.keepAliveTimeout,
      // the forwarding engine owns the request deadline
      headersTimeout: 0,
      bodyTimeout: 0,
    })

    return {
      async request(request: UpstreamRequest): Promise<UpstreamResponse> {
        if (!isHttpMethod(request.method)) {
          throw new TypeError(`Invalid HTTP method: ${request.method}`)
        }
        const response = await client.request({
          method: request.method,
          path: request.path,
          headers: request.headers,
          body: request.body ?? null,
          signal: request.signal,
        })
        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: response.body,
        }
      },
      destroy: () => client.destroy(),
    }
  }
}
