/**
 * Header and path rewriting for forwarded requests
 */
import { randomBytes } from 'node:crypto'
import type { IncomingMessage } from 'node:http'
import type { Route, UpstreamTarget } from '../interfaces/route'

/**
 * Connection-level headers that never cross a proxy (RFC 9110 section 7.6.1)
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'expect',
])

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/

export type HeaderValues = Record<string, string | string[] | undefined>
export type OutgoingHeaders = Record<string, string | string[]>

export function generateRequestId(): string {
  return `req_${Date.now()}_${randomBytes(8).toString('hex')}`
}

/**
 * Reuses the client's X-Request-ID when it is a plain token
 */
export function resolveRequestId(value: string | string[] | undefined): string {
  if (typeof value === 'string' && REQUEST_ID_PATTERN.test(value)) {
    return value
  }
  return generateRequestId()
}

/**
 * Copies headers without hop-by-hop ones, including every header the
 * Connection header names
 */
export function stripHopByHop(headers: HeaderValues): OutgoingHeaders {
  const named = new Set<string>()
  const connection = headers.connection
  const tokens = Array.isArray(connection) ? connection : [connection ?? '']
  for (const token of tokens.join(',').split(',')) {
    const name = token.trim().toLowerCase()
    if (name) named.add(name)
  }

  const result: OutgoingHeaders = {}
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue
    const key = name.toLowerCase()
    if (HOP_BY_HOP_HEADERS.has(key) || named.has(key)) continue
    result[key] = value
  }
  return result
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

/**
 * Headers sent upstream: the client's end-to-end headers, forwarding
 * headers, the request id and the route's own headers
 */
export function buildUpstreamHeaders(
  req: IncomingMessage,
  route: Route,
  target: UpstreamTarget,
  requestId: string,
): OutgoingHeaders {
  const headers = stripHopByHop(req.headers)

  const clientIp = req.socket.remoteAddress
  if (clientIp) {
    const prior = firstValue(req.headers['x-forwarded-for'])
    headers['x-forwarded-for'] = prior ? `${prior}, ${clientIp}` : clientIp
  }

  const host = req.headers.host
  if (!req.headers['x-forwarded-host'] && host) {
    headers['x-forwarded-host'] = host
  }

  if (!req.headers['x-forwarded-proto']) {
    const encrypted =
      'encrypted' in req.socket && req.socket.encrypted === true
    headers['x-forwarded-proto'] = encrypted ? 'https' : 'http'
  }

  headers['x-request-id'] = requestId

  for (const [name, value] of Object.entries(route.headers)) {
    headers[name.toLowerCase()] = value
  }

  if (!route.preserveHost || !host) {
    headers.host = new URL(target.origin).host
  }

  return headers
}

/**
 * Path and query sent upstream
 *
 * With `stripPrefix` the matched prefix is removed first, then the target's
 * base path is prepended.
 *
 * @example
 * rewritePath(route('/api', strip), target('http://b/v1'), '/api/users?x=1')
 * // '/v1/users?x=1'
 */
export function rewritePath(
  route: Route,
  target: UpstreamTarget,
  url: string,
): string {
  const queryIndex = url.indexOf('?')
  let path = queryIndex === -1 ? url : url.slice(0, queryIndex)
  const query = queryIndex === -1 ? '' : url.slice(queryIndex)

  if (route.stripPrefix && route.pathPrefix !== '/') {
    path = path.slice(route.pathPrefix.length)
    if (!path.startsWith('/')) path = `/${path}`
  }

  return `${target.basePath}${path}${query}`
}
