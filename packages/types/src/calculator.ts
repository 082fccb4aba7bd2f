/**
 * Calculator Program Types
 *
 * Instruction model and execution context shared by the codec,
 * the program and the CLI.
 */

import type { CalculatorError } from './errors'
import type { Safe } from './safe'

/**
 * Operation selectors as they appear in byte 0 of the payload
 */
export enum Operation {
  Add = 0,
  Subtract = 1,
  Multiply = 2,
  Divide = 3,
  Modulo = 4,
  Power = 5,
}

/**
 * Decoded instruction payload.
 *
 * `operation` stays a raw u8 so that an unknown selector survives decoding
 * and is rejected at dispatch.
 */
export interface Instruction {
  operation: number
  left: bigint
  right: bigint
}

/**
 * How results outside the signed 64-bit range are handled
 * - wrap: two's complement wraparound
 * - trap: fail with ArithmeticOverflow
 */
export type OverflowPolicy = 'wrap' | 'trap'

export const OVERFLOW_POLICIES = ['wrap', 'trap'] as const

/**
 * Diagnostic log sink, the counterpart of the host runtime's `msg!`
 */
export type ProgramLog = (message: string) => void

export interface EvaluateOptions {
  overflow?: OverflowPolicy
  log?: ProgramLog
}

export interface InstructionContext {
  instruction: Instruction
  overflow: OverflowPolicy
  log: ProgramLog
}

export type InstructionResult = Safe<bigint, CalculatorError>

export type InvocationStatus = 'success' | 'failed'

export interface ProgramInvocation {
  status: InvocationStatus
  result?: bigint
  error?: CalculatorError
  logs: string[]
}
