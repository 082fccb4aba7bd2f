/**
 * Validation utilities for CLI arguments
 */

import { isValidHex, normalizeHex } from '@bytecalc/core'
import { I64_CONFIG } from '@bytecalc/program'
import type { Safe } from '@bytecalc/types'
import { Operation, safeError, safeResult } from '@bytecalc/types'

const OPERATION_NAMES = new Map<string, Operation>([
  ['add', Operation.Add],
  ['sub', Operation.Subtract],
  ['subtract', Operation.Subtract],
  ['mul', Operation.Multiply],
  ['multiply', Operation.Multiply],
  ['div', Operation.Divide],
  ['divide', Operation.Divide],
  ['mod', Operation.Modulo],
  ['modulo', Operation.Modulo],
  ['pow', Operation.Power],
  ['power', Operation.Power],
])

/**
 * Validates if a string is a valid hex payload (with or without 0x prefix)
 */
export function isValidHexPayload(hex: string): boolean {
  if (!hex) {
    return false
  }
  return isValidHex(normalizeHex(hex))
}

/**
 * Parse an operation given by name (case-insensitive) or by selector.
 * Any selector 0..255 is accepted so that unknown operations can be encoded.
 */
export function parseOperation(value: string): Safe<number> {
  const named = OPERATION_NAMES.get(value.toLowerCase())
  if (named !== undefined) {
    return safeResult(named)
  }

  if (/^\d+$/.test(value)) {
    const selector = Number.parseInt(value, 10)
    if (selector <= 0xff) {
      return safeResult(selector)
    }
  }

  return safeError(
    new Error(
      `Invalid operation: ${value} (expected ${[...OPERATION_NAMES.keys()].join(', ')} or a selector 0-255)`,
    ),
  )
}

/**
 * Parse a signed 64-bit decimal operand
 */
export function parseOperand(value: string): Safe<bigint> {
  if (!/^-?\d+$/.test(value)) {
    return safeError(new Error(`Invalid operand: ${value} is not an integer`))
  }

  const operand = BigInt(value)
  if (operand < I64_CONFIG.MIN || operand > I64_CONFIG.MAX) {
    return safeError(
      new Error(`Invalid operand: ${value} does not fit in a signed 64-bit integer`),
    )
  }

  return safeResult(operand)
}
