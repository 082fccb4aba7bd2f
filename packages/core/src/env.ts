import { config as dotenvConfig } from 'dotenv'
import type { Safe } from '@bytecalc/types'
import { OVERFLOW_POLICIES, safeError, safeResult } from '@bytecalc/types'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PINO_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
})

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables, or an error naming every invalid variable
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
): Safe<z.infer<T>> {
  dotenvConfig({ path: envPath })

  const parsed = schema.safeParse(process.env)
  if (!parsed.success) {
    return safeError(
      new Error(
        `Invalid environment: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      ),
    )
  }
  return safeResult(parsed.data)
}

/**
 * Create a complete environment schema by extending the base schema
 * @param additionalSchema - Additional schema to extend the base schema with
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}

export const calculatorEnvSchema = createEnvSchema({
  BYTECALC_OVERFLOW: z.enum(OVERFLOW_POLICIES).default('wrap'),
})

export type CalculatorEnv = z.infer<typeof calculatorEnvSchema>

export function loadCalculatorEnv(envPath?: string): Safe<CalculatorEnv> {
  return loadEnvVariables(calculatorEnvSchema, envPath)
}
