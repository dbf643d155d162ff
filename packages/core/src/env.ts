import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<T> {
  dotenvConfig({ path: envPath, processEnv: source })
  return schema.parse(source)
}

/**
 * Create a complete environment schema by extending the base schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}

const integer = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback)

export const runtimeEnvSchema = createEnvSchema({
  NETQ_FLAVOUR: z.enum(['vanilla', 'nv']).default('vanilla'),
  NETQ_APP_ID: integer(0, 0, 0xffff),
  NETQ_MAX_STEPS: integer(1_000_000, 1, Number.MAX_SAFE_INTEGER),
  NETQ_QUBIT_CAPACITY: integer(32, 1, 0x7fffffff),
})

/**
 * Runtime configuration handed explicitly to sessions and executors.
 * Nothing below the entry point reads the environment.
 */
export interface RuntimeConfig {
  logLevel: BaseEnv['LOG_LEVEL']
  flavour: 'vanilla' | 'nv'
  appId: number
  maxSteps: number
  qubitCapacity: number
}

export function loadRuntimeConfig(
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const env = loadEnvVariables(runtimeEnvSchema, envPath, source)
  return {
    logLevel: env.LOG_LEVEL,
    flavour: env.NETQ_FLAVOUR,
    appId: env.NETQ_APP_ID,
    maxSteps: env.NETQ_MAX_STEPS,
    qubitCapacity: env.NETQ_QUBIT_CAPACITY,
  }
}
