import type {
  Instruction,
  InstructionContext,
  InstructionResult,
} from '@bytecalc/types'
import {
  CALCULATOR_ERRORS,
  CalculatorError,
  Operation,
  safeError,
  safeResult,
} from '@bytecalc/types'
import { EXPONENT_CONFIG, I64_CONFIG } from '../config'
import { BaseInstruction } from './base'

export class AddInstruction extends BaseInstruction {
  readonly opcode = Operation.Add
  readonly name = 'ADD'
  readonly description = 'Add two signed 64-bit operands'
  protected readonly label = 'Addition'
  protected readonly symbol = '+'

  execute(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    this.logOperation(context)
    return this.fitResult(context, left + right)
  }
}

export class SubtractInstruction extends BaseInstruction {
  readonly opcode = Operation.Subtract
  readonly name = 'SUB'
  readonly description = 'Subtract the right operand from the left'
  protected readonly label = 'Subtraction'
  protected readonly symbol = '-'

  execute(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    this.logOperation(context)
    return this.fitResult(context, left - right)
  }
}

export class MultiplyInstruction extends BaseInstruction {
  readonly opcode = Operation.Multiply
  readonly name = 'MUL'
  readonly description = 'Multiply two signed 64-bit operands'
  protected readonly label = 'Multiplication'
  protected readonly symbol = '*'

  execute(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    this.logOperation(context)
    return this.fitResult(context, left * right)
  }
}

export class DivideInstruction extends BaseInstruction {
  readonly opcode = Operation.Divide
  readonly name = 'DIV'
  readonly description = 'Divide, rounding towards zero'
  protected readonly label = 'Division'
  protected readonly symbol = '/'

  validate(instruction: Instruction): CalculatorError | null {
    if (instruction.right === 0n) {
      return new CalculatorError(
        CALCULATOR_ERRORS.DIVISION_BY_ZERO,
        'Division by zero is not allowed',
        { left: instruction.left },
      )
    }
    return null
  }

  execute(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    this.logOperation(context)
    const violation = this.checkPreconditions(context)
    if (violation) {
      return safeError(violation)
    }

    // bigint division truncates; only MIN / -1 leaves the i64 range
    return this.fitResult(context, left / right)
  }
}

export class ModuloInstruction extends BaseInstruction {
  readonly opcode = Operation.Modulo
  readonly name = 'MOD'
  readonly description = 'Remainder of truncating division, sign follows the left operand'
  protected readonly label = 'Modulus'
  protected readonly symbol = '%'

  validate(instruction: Instruction): CalculatorError | null {
    if (instruction.right === 0n) {
      return new CalculatorError(
        CALCULATOR_ERRORS.DIVISION_BY_ZERO,
        'Modulus by zero is not allowed',
        { left: instruction.left },
      )
    }
    return null
  }

  execute(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    this.logOperation(context)
    const violation = this.checkPreconditions(context)
    if (violation) {
      return safeError(violation)
    }

    // MIN % -1 is 0, but the quotient it implies overflows
    if (
      this.isTrapping(context.overflow) &&
      left === I64_CONFIG.MIN &&
      right === -1n
    ) {
      return this.overflowError(context)
    }

    return safeResult(left % right)
  }
}

export class PowerInstruction extends BaseInstruction {
  readonly opcode = Operation.Power
  readonly name = 'POW'
  readonly description = 'Raise the left operand to a non-negative exponent'
  protected readonly label = 'Power'
  protected readonly symbol = '^'

  validate(instruction: Instruction): CalculatorError | null {
    if (instruction.right < 0n) {
      return new CalculatorError(
        CALCULATOR_ERRORS.NEGATIVE_EXPONENT,
        'Negative exponent is not allowed',
        { exponent: instruction.right },
      )
    }
    return null
  }

  execute(context: InstructionContext): InstructionResult {
    const { left, right } = context.instruction
    this.logOperation(context)
    const violation = this.checkPreconditions(context)
    if (violation) {
      return safeError(violation)
    }

    if (this.isTrapping(context.overflow)) {
      const result = this.checkedPow(left, right)
      return result === null ? this.overflowError(context) : safeResult(result)
    }

    // wrap: the exponent is narrowed to u32 before use
    const exponent = BigInt.asUintN(EXPONENT_CONFIG.BITS, right)
    return safeResult(this.wrappingPow(left, exponent))
  }

  /**
   * Square-and-multiply, wrapping every step into i64
   */
  private wrappingPow(base: bigint, exponent: bigint): bigint {
    let result = 1n
    let square = base
    let remaining = exponent
    while (remaining > 0n) {
      if ((remaining & 1n) === 1n) {
        result = this.toSigned64(result * square)
      }
      remaining >>= 1n
      if (remaining > 0n) {
        square = this.toSigned64(square * square)
      }
    }
    return result
  }

  /**
   * Square-and-multiply that gives up as soon as a needed factor leaves i64
   * @returns null on overflow
   */
  private checkedPow(base: bigint, exponent: bigint): bigint | null {
    if (exponent === 0n) {
      return 1n
    }

    let accumulator = 1n
    let square = base
    let remaining = exponent
    while (remaining > 1n) {
      if ((remaining & 1n) === 1n) {
        accumulator *= square
        if (!this.isInI64Range(accumulator)) return null
      }
      remaining >>= 1n
      square *= square
      if (!this.isInI64Range(square)) return null
    }

    accumulator *= square
    return this.isInI64Range(accumulator) ? accumulator : null
  }
}
