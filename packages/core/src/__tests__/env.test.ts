import { afterEach, describe, expect, it } from 'vitest'
import { calculatorEnvSchema, createEnvSchema, loadCalculatorEnv } from '../env'
import { z } from '../zod'

describe('Environment loading', () => {
  const saved = process.env['BYTECALC_OVERFLOW']

  afterEach(() => {
    if (saved === undefined) {
      delete process.env['BYTECALC_OVERFLOW']
    } else {
      process.env['BYTECALC_OVERFLOW'] = saved
    }
  })

  it('should default to the wrap overflow policy', () => {
    const env = calculatorEnvSchema.parse({})
    expect(env.BYTECALC_OVERFLOW).toBe('wrap')
    expect(env.PINO_LEVEL).toBe('info')
    expect(env.NODE_ENV).toBe('development')
  })

  it('should reject an unknown overflow policy', () => {
    expect(() =>
      calculatorEnvSchema.parse({ BYTECALC_OVERFLOW: 'saturate' }),
    ).toThrow()
  })

  it('should read the policy from process.env', () => {
    process.env['BYTECALC_OVERFLOW'] = 'trap'
    const [error, env] = loadCalculatorEnv('/nonexistent/.env')
    expect(error).toBeUndefined()
    expect(env?.BYTECALC_OVERFLOW).toBe('trap')
  })

  it('should report invalid variables instead of throwing', () => {
    process.env['BYTECALC_OVERFLOW'] = 'saturate'
    const [error, env] = loadCalculatorEnv('/nonexistent/.env')
    expect(env).toBeUndefined()
    expect(error?.message).toMatch(/^Invalid environment: BYTECALC_OVERFLOW: /)
  })

  it('should extend the base schema', () => {
    const schema = createEnvSchema({ EXTRA: z.string().default('x') })
    expect(schema.parse({}).EXTRA).toBe('x')
  })
})
