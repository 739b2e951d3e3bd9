/**
 * Environment configuration for the gateway binary
 *
 * | Variable            | Default        | Effect                                   |
 * |---------------------|----------------|------------------------------------------|
 * | `LISTEN_ADDR`       | `0.0.0.0:8080` | `host:port` to bind, `[::1]:8080` for v6  |
 * | `LOG_LEVEL`         | `info`         | pino level                               |
 * | `LOG_FORMAT`        | `json`         | `json` or `pretty`                       |
 * | `DOMAIN_SUFFIX`     |                | enables host-pattern routing             |
 * | `HTTPGATE_CONFIG`   |                | JSON file validated by the schema        |
 * | `SHUTDOWN_GRACE_MS` | `10000`        | drain time on SIGINT/SIGTERM             |
 * | `NODE_ENV`          |                | `production` hides error details         |
 *
 * Variables win over the file.
 */
import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigError } from '../errors/gateway-errors'
import type { GatewayConfig } from '../interfaces/gateway'
import type { LoggerConfig } from '../interfaces/logger'
import { formatIssues, parseGatewayConfig } from './schema'

export const DEFAULT_LISTEN_ADDR = '0.0.0.0:8080'

const envSchema = z.object({
  LISTEN_ADDR: z.string().optional(),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
  DOMAIN_SUFFIX: z.string().min(1).optional(),
  HTTPGATE_CONFIG: z.string().min(1).optional(),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().optional(),
  NODE_ENV: z.string().optional(),
})

export interface ListenAddress {
  hostname: string
  port: number
}

export interface EnvConfig {
  gateway: GatewayConfig
  logging: LoggerConfig
  /** Path of the JSON file the gateway config was read from */
  configPath?: string
}

/**
 * Parse `host:port`, with brackets around IPv6 hosts
 * @throws ConfigError
 */
export function parseListenAddr(value: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d{1,5})$/.exec(value.trim())
  const hostname = match?.[1] ?? match?.[2]
  const port = Number(match?.[3])
  if (!hostname || !Number.isInteger(port) || port > 65535) {
    throw new ConfigError('Invalid LISTEN_ADDR', [
      `expected host:port, got "${value}"`,
    ])
  }
  return { hostname, port }
}

/**
 * Read and validate a JSON gateway config file
 * @throws ConfigError
 */
export function loadConfigFile(path: string): GatewayConfig {
  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}`, [
      error instanceof Error ? error.message : String(error),
    ])
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ])
  }
  return parseGatewayConfig(parsed)
}

/**
 * Build the gateway and logger configuration from the environment
 * @throws ConfigError
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): EnvConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      formatIssues(result.error),
    )
  }
  const vars = result.data

  const file: GatewayConfig = vars.HTTPGATE_CONFIG
    ? loadConfigFile(vars.HTTPGATE_CONFIG)
    : {}

  const listen =
    vars.LISTEN_ADDR !== undefined
      ? parseListenAddr(vars.LISTEN_ADDR)
      : file.server?.port !== undefined || file.server?.hostname !== undefined
        ? null
        : parseListenAddr(DEFAULT_LISTEN_ADDR)

  const gateway: GatewayConfig = {
    ...file,
    server: {
      ...file.server,
      ...(listen ?? {}),
      ...(vars.SHUTDOWN_GRACE_MS !== undefined
        ? { shutdownGracePeriod: vars.SHUTDOWN_GRACE_MS }
        : {}),
    },
    errors: {
      ...file.errors,
      production: file.errors?.production ?? vars.NODE_ENV === 'production',
    },
  }

  if (vars.DOMAIN_SUFFIX) {
    gateway.hostPattern = {
      ...file.hostPattern,
      enabled: true,
      domainSuffix: vars.DOMAIN_SUFFIX,
    }
  }

  return {
    gateway,
    logging: { level: vars.LOG_LEVEL, format: vars.LOG_FORMAT },
    ...(vars.HTTPGATE_CONFIG ? { configPath: vars.HTTPGATE_CONFIG } : {}),
  }
}
