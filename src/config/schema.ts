/**
 * Gateway configuration schema
 *
 * Validates untrusted configuration (a JSON file, an admin payload) into a
 * GatewayConfig. Programmatic callers can pass a GatewayConfig directly;
 * route level checks run again when the route table is published.
 *
 * @example
 * ```ts
 * const config = parseGatewayConfig(JSON.parse(raw))
 * const gateway = new HttpGateway({ ...config, logger })
 * ```
 */
import { z } from 'zod'
import { ConfigError } from '../errors/gateway-errors'
import type { GatewayConfig } from '../interfaces/gateway'

const port = z.number().int().min(0).max(65535)
const positiveMs = z.number().int().positive()
const nonNegativeInt = z.number().int().nonnegative()
const statusCode = z.number().int().min(100).max(599)

export const balancingStrategySchema = z.enum([
  'failover',
  'round-robin',
  'weighted',
  'random',
  'least-connections',
])

export const routePolicySchema = z
  .object({
    timeout: positiveMs,
    retries: nonNegativeInt,
    maxConcurrency: nonNegativeInt,
    strategy: balancingStrategySchema,
  })
  .partial()
  .strict()

export const upstreamTargetSchema = z
  .object({
    url: z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), {
        message: 'Target URL must use http or https',
      }),
    weight: z.number().positive().optional(),
    metadata: z.record(z.string()).optional(),
  })
  .strict()

export const routeSchema = routePolicySchema
  .extend({
    id: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    pathPrefix: z.string().startsWith('/', 'Path prefix must start with /'),
    targets: z.array(upstreamTargetSchema).min(1, 'At least one target'),
    stripPrefix: z.boolean().optional(),
    preserveHost: z.boolean().optional(),
    headers: z.record(z.string()).optional(),
  })
  .strict()

export const gatewayConfigSchema = z
  .object({
    server: z
      .object({
        port: port.optional(),
        hostname: z.string().min(1).optional(),
        shutdownGracePeriod: nonNegativeInt.optional(),
      })
      .strict()
      .optional(),
    routes: z.array(routeSchema).optional(),
    routeDefaults: routePolicySchema.optional(),
    pool: z
      .object({
        maxConnections: z.number().int().positive(),
        idleTimeout: positiveMs,
        connectTimeout: positiveMs,
        keepAliveTimeout: positiveMs,
      })
      .partial()
      .strict()
      .optional(),
    admission: z
      .object({
        maxConcurrent: nonNegativeInt,
        maxQueue: nonNegativeInt,
        maxWait: nonNegativeInt,
      })
      .partial()
      .strict()
      .optional(),
    circuitBreaker: z
      .object({
        failureThreshold: z.number().int().positive(),
        windowMs: positiveMs,
        cooldown: positiveMs,
        backoffMultiplier: z.number().min(1),
        maxCooldown: positiveMs,
        maxTrackedTargets: z.number().int().positive(),
      })
      .partial()
      .strict()
      .refine(
        (value) =>
          value.cooldown === undefined ||
          value.maxCooldown === undefined ||
          value.maxCooldown >= value.cooldown,
        { message: 'maxCooldown must not be below cooldown' },
      )
      .optional(),
    forwarding: z
      .object({
        maxBufferedBodyBytes: nonNegativeInt,
        failureStatusCodes: z.array(statusCode),
      })
      .partial()
      .strict()
      .optional(),
    errors: z
      .object({
        production: z.boolean(),
        customMessages: z.record(
          z.string().regex(/^\d{3}$/, 'Keys must be status codes'),
          z.string(),
        ),
      })
      .partial()
      .strict()
      .optional(),
    hostPattern: z
      .object({
        enabled: z.boolean(),
        domainSuffix: z.string().min(1),
        backendTemplate: z.string().min(1),
        services: z.record(z.string().min(1)),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict()

export type GatewayFileConfig = z.infer<typeof gatewayConfigSchema>

/**
 * Format zod issues as `path: message`
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
  )
}

/**
 * Validate untrusted input into a GatewayConfig
 * @throws ConfigError listing every issue
 */
export function parseGatewayConfig(input: unknown): GatewayConfig {
  const result = gatewayConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      'Invalid gateway configuration',
      formatIssues(result.error),
    )
  }
  return result.data
}
