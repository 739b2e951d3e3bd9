/**
 * httpgate binary
 *
 * Reads configuration from the environment, starts the gateway and wires
 * process signals: SIGINT/SIGTERM close gracefully, SIGHUP reloads the
 * configuration file.
 */
import { loadConfigFromEnv } from './config/env'
import { HttpGateway } from './gateway/gateway'
import { createLogger, defaultLogger } from './logger/pino-logger'

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

async function main(): Promise<void> {
  const { gateway: config, logging, configPath } = loadConfigFromEnv()
  const logger = createLogger(logging)
  const gateway = new HttpGateway({ ...config, logger })

  await gateway.listen()

  let closing = false
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return
    closing = true
    logger.info('Shutting down', { signal })
    gateway.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', toError(error))
        process.exit(1)
      },
    )
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
  process.on('SIGHUP', () => {
    try {
      const next = loadConfigFromEnv()
      const version = gateway.reload({ ...next.gateway, logger })
      logger.info('Reloaded on SIGHUP', { version, configPath })
    } catch (error) {
      logger.error(
        'Reload failed, keeping the current configuration',
        toError(error),
      )
    }
  })
}

main().catch((error: unknown) => {
  defaultLogger.error('Gateway failed to start', toError(error))
  process.exit(1)
})
