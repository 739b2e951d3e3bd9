/**
 * Echo upstream for trying the gateway locally
 *
 *   SERVER_ID=a SERVER_PORT=8081 tsx examples/echo-server.ts
 */
import { createServer } from 'node:http'
import { createLogger } from '../src'

const serverId = process.env.SERVER_ID ?? 'unknown'
const port = parseInt(process.env.SERVER_PORT ?? '8081', 10)
const logger = createLogger({ level: 'info', format: 'pretty' }).child({
  server: serverId,
})

let requestCount = 0
const startTime = Date.now()

const server = createServer((req, res) => {
  requestCount++

  if (req.url === '/health') {
    res.writeHead(200, { 'content-type': 'text/plain' })
    res.end('OK')
    return
  }

  // up to 200ms of latency so balancing strategies have something to do
  const delay = Math.floor(Math.random() * 200)
  setTimeout(() => {
    res.writeHead(200, { 'content-type': 'application/json' })
    res.end(
      JSON.stringify(
        {
          server_id: serverId,
          request_count: requestCount,
          uptime_ms: Date.now() - startTime,
          method: req.method,
          url: req.url,
          headers: req.headers,
        },
        null,
        2,
      ),
    )
  }, delay)
})

server.listen(port, () => {
  logger.info(`Echo server running on http://localhost:${port}`)
})

process.on('SIGINT', () => {
  logger.info('Shutting down echo server', { requestCount })
  server.close(() => process.exit(0))
})
