/**
 * Calculator Arithmetic Instruction Tests
 * Handler-level tests for ADD, SUB, MUL, DIV, MOD and POW under both
 * overflow policies
 */

import { logger } from '@bytecalc/core'
import type {
  InstructionContext,
  OverflowPolicy,
} from '@bytecalc/types'
import { CALCULATOR_ERRORS, Operation } from '@bytecalc/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { I64_CONFIG } from '../../config'
import {
  AddInstruction,
  DivideInstruction,
  ModuloInstruction,
  MultiplyInstruction,
  PowerInstruction,
  SubtractInstruction,
} from '../arithmetic'

beforeAll(() => {
  logger.init()
})

const MIN = I64_CONFIG.MIN
const MAX = I64_CONFIG.MAX

function createContext(
  operation: Operation,
  left: bigint,
  right: bigint,
  overflow: OverflowPolicy = 'wrap',
): InstructionContext & { lines: string[] } {
  const lines: string[] = []
  return {
    instruction: { operation, left, right },
    overflow,
    log: (message) => {
      lines.push(message)
    },
    lines,
  }
}

describe('Calculator Arithmetic Instructions', () => {
  describe('ADD', () => {
    const add = new AddInstruction()

    it('should add two operands', () => {
      const context = createContext(Operation.Add, 10n, 5n)
      expect(add.execute(context)).toEqual([undefined, 15n])
      expect(context.lines).toEqual(['Addition: 10 + 5'])
    })

    it('should add negative operands', () => {
      expect(add.execute(createContext(Operation.Add, -7n, -8n))).toEqual([
        undefined,
        -15n,
      ])
    })

    it('should wrap MAX + 1 to MIN under the wrap policy', () => {
      expect(add.execute(createContext(Operation.Add, MAX, 1n))).toEqual([
        undefined,
        MIN,
      ])
    })

    it('should reject MAX + 1 under the trap policy', () => {
      const context = createContext(Operation.Add, MAX, 1n, 'trap')
      const [error, result] = add.execute(context)
      expect(result).toBeUndefined()
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
      expect(context.lines).toEqual([
        'Addition: 9223372036854775807 + 1',
        'Arithmetic overflow: 9223372036854775807 + 1 does not fit in a signed 64-bit integer',
      ])
    })

    it('should disassemble with its mnemonic', () => {
      expect(add.disassemble({ operation: 0, left: 10n, right: -5n })).toBe(
        'ADD 10 -5',
      )
    })
  })

  describe('SUB', () => {
    const sub = new SubtractInstruction()

    it('should subtract the right operand from the left', () => {
      const context = createContext(Operation.Subtract, 20n, 8n)
      expect(sub.execute(context)).toEqual([undefined, 12n])
      expect(context.lines).toEqual(['Subtraction: 20 - 8'])
    })

    it('should go below zero', () => {
      expect(sub.execute(createContext(Operation.Subtract, 3n, 10n))).toEqual([
        undefined,
        -7n,
      ])
    })

    it('should wrap MIN - 1 to MAX under the wrap policy', () => {
      expect(sub.execute(createContext(Operation.Subtract, MIN, 1n))).toEqual([
        undefined,
        MAX,
      ])
    })

    it('should reject MIN - 1 under the trap policy', () => {
      const [error] = sub.execute(
        createContext(Operation.Subtract, MIN, 1n, 'trap'),
      )
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
    })
  })

  describe('MUL', () => {
    const mul = new MultiplyInstruction()

    it('should multiply two operands', () => {
      const context = createContext(Operation.Multiply, 6n, -7n)
      expect(mul.execute(context)).toEqual([undefined, -42n])
      expect(context.lines).toEqual(['Multiplication: 6 * -7'])
    })

    it('should keep the low 64 bits of 2^32 * 2^32 under the wrap policy', () => {
      expect(
        mul.execute(createContext(Operation.Multiply, 2n ** 32n, 2n ** 32n)),
      ).toEqual([undefined, 0n])
    })

    it('should wrap MIN * -1 back to MIN', () => {
      expect(mul.execute(createContext(Operation.Multiply, MIN, -1n))).toEqual(
        [undefined, MIN],
      )
    })

    it('should reject 2^32 * 2^32 under the trap policy', () => {
      const [error] = mul.execute(
        createContext(Operation.Multiply, 2n ** 32n, 2n ** 32n, 'trap'),
      )
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
    })
  })

  describe('DIV', () => {
    const div = new DivideInstruction()

    it('should truncate towards zero', () => {
      expect(div.execute(createContext(Operation.Divide, 7n, 2n))).toEqual([
        undefined,
        3n,
      ])
      expect(div.execute(createContext(Operation.Divide, -7n, 2n))).toEqual([
        undefined,
        -3n,
      ])
      expect(div.execute(createContext(Operation.Divide, 7n, -2n))).toEqual([
        undefined,
        -3n,
      ])
    })

    it('should reject a zero divisor and log why', () => {
      const context = createContext(Operation.Divide, 10n, 0n)
      const [error, result] = div.execute(context)
      expect(result).toBeUndefined()
      expect(error?.code).toBe(CALCULATOR_ERRORS.DIVISION_BY_ZERO)
      expect(context.lines).toEqual([
        'Division: 10 / 0',
        'Division by zero is not allowed',
      ])
    })

    it('should report a zero divisor through validate', () => {
      expect(div.validate({ operation: 3, left: 1n, right: 0n })?.code).toBe(
        CALCULATOR_ERRORS.DIVISION_BY_ZERO,
      )
      expect(div.validate({ operation: 3, left: 1n, right: 2n })).toBeNull()
    })

    it('should wrap MIN / -1 to MIN under the wrap policy', () => {
      expect(div.execute(createContext(Operation.Divide, MIN, -1n))).toEqual([
        undefined,
        MIN,
      ])
    })

    it('should reject MIN / -1 under the trap policy', () => {
      const [error] = div.execute(
        createContext(Operation.Divide, MIN, -1n, 'trap'),
      )
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
    })
  })

  describe('MOD', () => {
    const mod = new ModuloInstruction()

    it('should take the sign of the left operand', () => {
      expect(mod.execute(createContext(Operation.Modulo, 7n, 3n))).toEqual([
        undefined,
        1n,
      ])
      expect(mod.execute(createContext(Operation.Modulo, -7n, 3n))).toEqual([
        undefined,
        -1n,
      ])
      expect(mod.execute(createContext(Operation.Modulo, 7n, -3n))).toEqual([
        undefined,
        1n,
      ])
    })

    it('should reject a zero divisor and log why', () => {
      const context = createContext(Operation.Modulo, 10n, 0n)
      const [error] = mod.execute(context)
      expect(error?.code).toBe(CALCULATOR_ERRORS.DIVISION_BY_ZERO)
      expect(context.lines).toEqual([
        'Modulus: 10 % 0',
        'Modulus by zero is not allowed',
      ])
    })

    it('should return 0 for MIN % -1 under the wrap policy', () => {
      expect(mod.execute(createContext(Operation.Modulo, MIN, -1n))).toEqual([
        undefined,
        0n,
      ])
    })

    it('should reject MIN % -1 under the trap policy', () => {
      const [error] = mod.execute(
        createContext(Operation.Modulo, MIN, -1n, 'trap'),
      )
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
    })
  })

  describe('POW', () => {
    const pow = new PowerInstruction()

    it('should compute 2^10', () => {
      const context = createContext(Operation.Power, 2n, 10n)
      expect(pow.execute(context)).toEqual([undefined, 1024n])
      expect(context.lines).toEqual(['Power: 2 ^ 10'])
    })

    it('should return 1 for a zero exponent', () => {
      expect(pow.execute(createContext(Operation.Power, 0n, 0n))).toEqual([
        undefined,
        1n,
      ])
      expect(pow.execute(createContext(Operation.Power, -9n, 0n))).toEqual([
        undefined,
        1n,
      ])
    })

    it('should keep the sign of a negative base for odd exponents', () => {
      expect(pow.execute(createContext(Operation.Power, -3n, 3n))).toEqual([
        undefined,
        -27n,
      ])
      expect(pow.execute(createContext(Operation.Power, -3n, 4n))).toEqual([
        undefined,
        81n,
      ])
    })

    it('should reject a negative exponent and log why', () => {
      const context = createContext(Operation.Power, 3n, -1n)
      const [error] = pow.execute(context)
      expect(error?.code).toBe(CALCULATOR_ERRORS.NEGATIVE_EXPONENT)
      expect(context.lines).toEqual([
        'Power: 3 ^ -1',
        'Negative exponent is not allowed',
      ])
    })

    it('should wrap 2^64 to 0 and 2^63 to MIN under the wrap policy', () => {
      expect(pow.execute(createContext(Operation.Power, 2n, 64n))).toEqual([
        undefined,
        0n,
      ])
      expect(pow.execute(createContext(Operation.Power, 2n, 63n))).toEqual([
        undefined,
        MIN,
      ])
    })

    it('should narrow the exponent to 32 bits under the wrap policy', () => {
      // 2^32 + 3 narrows to 3
      expect(
        pow.execute(createContext(Operation.Power, 2n, 2n ** 32n + 3n)),
      ).toEqual([undefined, 8n])
    })

    it('should compute (-2)^63 exactly under the trap policy', () => {
      expect(
        pow.execute(createContext(Operation.Power, -2n, 63n, 'trap')),
      ).toEqual([undefined, MIN])
    })

    it('should reject 2^63 under the trap policy', () => {
      const [error] = pow.execute(
        createContext(Operation.Power, 2n, 63n, 'trap'),
      )
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
    })

    it('should not narrow the exponent under the trap policy', () => {
      expect(
        pow.execute(createContext(Operation.Power, -1n, 2n ** 32n + 1n, 'trap')),
      ).toEqual([undefined, -1n])
      expect(
        pow.execute(createContext(Operation.Power, 1n, MAX, 'trap')),
      ).toEqual([undefined, 1n])
      expect(
        pow.execute(createContext(Operation.Power, 0n, MAX, 'trap')),
      ).toEqual([undefined, 0n])
      const [error] = pow.execute(
        createContext(Operation.Power, 2n, 2n ** 32n + 3n, 'trap'),
      )
      expect(error?.code).toBe(CALCULATOR_ERRORS.ARITHMETIC_OVERFLOW)
    })
  })
})
