/**
 * Base Calculator Instruction System
 *
 * Defines the base interface and abstract class for all operation handlers.
 */

import type {
  Instruction,
  InstructionContext,
  InstructionResult,
  Operation,
  OverflowPolicy,
} from '@bytecalc/types'
import {
  CALCULATOR_ERRORS,
  CalculatorError,
  safeError,
  safeResult,
} from '@bytecalc/types'
import { I64_CONFIG } from '../config'

/**
 * Base interface for all calculator operation handlers
 */
export interface CalculatorInstructionHandler {
  readonly opcode: Operation
  readonly name: string
  readonly description: string

  /**
   * Execute the instruction
   * @returns the signed 64-bit result, or the error that ends the call
   */
  execute(context: InstructionContext): InstructionResult

  /**
   * Check operand preconditions
   * @returns the violated precondition, or null when the operands are accepted
   */
  validate(instruction: Instruction): CalculatorError | null

  /**
   * Disassemble instruction to string representation
   */
  disassemble(instruction: Instruction): string
}

/**
 * Abstract base class for calculator instructions
 */
export abstract class BaseInstruction implements CalculatorInstructionHandler {
  abstract readonly opcode: Operation
  abstract readonly name: string
  abstract readonly description: string

  /** Trace label, e.g. "Addition" */
  protected abstract readonly label: string
  /** Infix symbol used in trace and disassembly, e.g. "+" */
  protected abstract readonly symbol: string

  abstract execute(context: InstructionContext): InstructionResult

  validate(_instruction: Instruction): CalculatorError | null {
    return null
  }

  disassemble(instruction: Instruction): string {
    return `${this.name} ${instruction.left} ${instruction.right}`
  }

  /**
   * Emit the operation trace line, e.g. "Addition: 10 + 5"
   */
  protected logOperation(context: InstructionContext): void {
    const { left, right } = context.instruction
    context.log(`${this.label}: ${left} ${this.symbol} ${right}`)
  }

  /**
   * Run validate() and log the violation, if any
   */
  protected checkPreconditions(
    context: InstructionContext,
  ): CalculatorError | null {
    const violation = this.validate(context.instruction)
    if (violation) {
      context.log(violation.message)
    }
    return violation
  }

  protected isInI64Range(value: bigint): boolean {
    return value >= I64_CONFIG.MIN && value <= I64_CONFIG.MAX
  }

  /**
   * Two's complement wraparound into the signed 64-bit range
   */
  protected toSigned64(value: bigint): bigint {
    return BigInt.asIntN(I64_CONFIG.BITS, value)
  }

  /**
   * Bring an exact result into i64 according to the overflow policy
   */
  protected fitResult(
    context: InstructionContext,
    value: bigint,
  ): InstructionResult {
    if (this.isInI64Range(value)) {
      return safeResult(value)
    }
    if (context.overflow === 'wrap') {
      return safeResult(this.toSigned64(value))
    }
    return this.overflowError(context)
  }

  protected overflowError(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    const error = new CalculatorError(
      CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW,
      `Arithmetic overflow: ${left} ${this.symbol} ${right} does not fit in a signed 64-bit integer`,
      { operation: this.name, left, right },
    )
    context.log(error.message)
    return safeError(error)
  }

  protected isTrapping(policy: OverflowPolicy): boolean {
    return policy === 'trap'
  }
}
