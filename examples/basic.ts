/**
 * Gateway in front of two echo servers
 *
 *   SERVER_ID=a SERVER_PORT=8081 tsx examples/echo-server.ts
 *   SERVER_ID=b SERVER_PORT=8082 tsx examples/echo-server.ts
 *   tsx examples/basic.ts
 *   curl http://localhost:3000/api/lb/hello
 */
import { HttpGateway, createLogger } from '../src'

const logger = createLogger({ level: 'debug', format: 'pretty' })

const gateway = new HttpGateway({
  logger,
  server: { port: 3000, hostname: '127.0.0.1', shutdownGracePeriod: 5000 },
  routeDefaults: { timeout: 5000 },
  routes: [
    {
      id: 'simple',
      pathPrefix: '/api/simple/*',
      stripPrefix: true,
      targets: [{ url: 'http://localhost:8081' }],
    },
    {
      id: 'lb',
      pathPrefix: '/api/lb/*',
      stripPrefix: true,
      strategy: 'least-connections',
      retries: 1,
      maxConcurrency: 100,
      targets: [
        { url: 'http://localhost:8081', weight: 1 },
        { url: 'http://localhost:8082', weight: 1 },
      ],
    },
  ],
  admission: { maxConcurrent: 256, maxWait: 500 },
  circuitBreaker: { failureThreshold: 3, cooldown: 10000 },
  hooks: {
    onHealthTransition: (event) => {
      logger.info(`Target ${event.target} is now ${event.to}`)
    },
  },
})

await gateway.listen()

process.on('SIGINT', () => {
  logger.info('Shutting down...')
  gateway.close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error(
        'Shutdown failed',
        error instanceof Error ? error : new Error(String(error)),
      )
      process.exit(1)
    },
  )
})
