/**
 * Instruction Evaluation
 *
 * Dispatches a decoded instruction to its operation handler and logs the
 * outcome. Evaluation is synchronous and holds no state between calls;
 * the registry is built once and only read afterwards.
 */

import { logger } from '@bytecalc/core'
import type {
  EvaluateOptions,
  Instruction,
  InstructionContext,
  InstructionResult,
  ProgramLog,
} from '@bytecalc/types'
import {
  CALCULATOR_ERRORS,
  CalculatorError,
  safeError,
  safeResult,
} from '@bytecalc/types'
import { DEFAULT_OVERFLOW_POLICY } from './config'
import { InstructionRegistry } from './instructions/registry'

export const registry = new InstructionRegistry()

/**
 * Program log lines go to the debug level unless the caller injects a sink
 */
export const defaultProgramLog: ProgramLog = (message) => {
  logger.debug(message)
}

export function createInstructionContext(
  instruction: Instruction,
  options: EvaluateOptions = {},
): InstructionContext {
  return {
    instruction,
    overflow: options.overflow ?? DEFAULT_OVERFLOW_POLICY,
    log: options.log ?? defaultProgramLog,
  }
}

/**
 * Evaluate a decoded instruction
 *
 * @returns the signed 64-bit result, or UnknownOperation, DivisionByZero,
 * NegativeExponent or ArithmeticOverflow
 */
export function evaluate(
  instruction: Instruction,
  options: EvaluateOptions = {},
): InstructionResult {
  const context = createInstructionContext(instruction, options)

  const handler = registry.getHandler(instruction.operation)
  if (!handler) {
    context.log(`Unknown operation: ${instruction.operation}`)
    return safeError(
      new CalculatorError(
        CALCULATOR_ERRORS.UNKNOWN_OPERATION,
        `Unknown operation: ${instruction.operation}`,
        { operation: instruction.operation },
      ),
    )
  }

  const [error, result] = handler.execute(context)
  if (error) {
    return safeError(error)
  }

  context.log(`Result = ${result}`)
  return safeResult(result)
}

/**
 * Render an instruction as text, e.g. "ADD 10 5"
 */
export function disassemble(instruction: Instruction): string {
  const handler = registry.getHandler(instruction.operation)
  if (!handler) {
    return `UNKNOWN(${instruction.operation}) ${instruction.left} ${instruction.right}`
  }
  return handler.disassemble(instruction)
}
