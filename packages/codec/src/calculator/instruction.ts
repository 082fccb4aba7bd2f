/**
 * Calculator Instruction Serialization
 *
 * encode(I ∈ instruction) ≡ encode(
 *   encode[1](I_operation),
 *   encode[8](I_left),
 *   encode[8](I_right)
 * )
 *
 * Layout (little-endian, 17 bytes, no length prefix or padding):
 * 1. **operation** (1 byte): unsigned selector
 * 2. **left** (8 bytes): signed 64-bit operand
 * 3. **right** (8 bytes): signed 64-bit operand
 *
 * A payload decodes only when it is exactly 17 bytes long. Every byte
 * pattern of that length is a valid instruction; whether the selector
 * names a known operation is checked at dispatch, not here.
 *
 * Example: { operation: 0, left: 10, right: 5 }
 *   → 00 0a00000000000000 0500000000000000
 */

import { concatBytes } from '@bytecalc/core'
import type { Instruction, Safe } from '@bytecalc/types'
import {
  CALCULATOR_ERRORS,
  CalculatorError,
  safeError,
  safeResult,
} from '@bytecalc/types'
import {
  decodeFixedLength,
  decodeSignedFixedLength,
  encodeFixedLength,
  encodeSignedFixedLength,
} from '../core/fixed-length'

export const OPERATION_SIZE = 1n
export const OPERAND_SIZE = 8n
export const INSTRUCTION_SIZE = Number(OPERATION_SIZE + 2n * OPERAND_SIZE)

function decodeFailure(message: string, context?: Record<string, unknown>) {
  return safeError(
    new CalculatorError(CALCULATOR_ERRORS.DECODE_ERROR, message, context),
  )
}

/**
 * Encode an instruction into its 17-byte payload
 *
 * @param instruction - Instruction to encode
 * @returns Encoded payload, or DecodeError when a field is out of range
 */
export function encodeInstruction(
  instruction: Instruction,
): Safe<Uint8Array, CalculatorError> {
  const parts: Uint8Array[] = []

  if (!Number.isInteger(instruction.operation)) {
    return decodeFailure(
      `Invalid operation field: ${instruction.operation} is not an integer`,
      { field: 'operation' },
    )
  }

  // Operation: encode[1](I_operation)
  const [error, operation] = encodeFixedLength(
    BigInt(instruction.operation),
    OPERATION_SIZE,
  )
  if (error) {
    return decodeFailure(`Invalid operation field: ${error.message}`, {
      field: 'operation',
    })
  }
  parts.push(operation)

  // Left: encode[8](I_left)
  const [error2, left] = encodeSignedFixedLength(instruction.left, OPERAND_SIZE)
  if (error2) {
    return decodeFailure(`Invalid left operand: ${error2.message}`, {
      field: 'left',
    })
  }
  parts.push(left)

  // Right: encode[8](I_right)
  const [error3, right] = encodeSignedFixedLength(
    instruction.right,
    OPERAND_SIZE,
  )
  if (error3) {
    return decodeFailure(`Invalid right operand: ${error3.message}`, {
      field: 'right',
    })
  }
  parts.push(right)

  return safeResult(concatBytes(parts))
}

/**
 * Decode a 17-byte payload into an instruction
 *
 * @param data - Raw instruction payload
 * @returns Decoded instruction, or DecodeError for any other length
 */
export function decodeInstruction(
  data: Uint8Array,
): Safe<Instruction, CalculatorError> {
  if (data.length !== INSTRUCTION_SIZE) {
    return decodeFailure(
      `Invalid instruction payload length: expected ${INSTRUCTION_SIZE} bytes, got ${data.length}`,
      { length: data.length },
    )
  }

  const [error, operationResult] = decodeFixedLength(data, OPERATION_SIZE)
  if (error) {
    return decodeFailure(error.message, { field: 'operation' })
  }

  const [error2, leftResult] = decodeSignedFixedLength(
    operationResult.remaining,
    OPERAND_SIZE,
  )
  if (error2) {
    return decodeFailure(error2.message, { field: 'left' })
  }

  const [error3, rightResult] = decodeSignedFixedLength(
    leftResult.remaining,
    OPERAND_SIZE,
  )
  if (error3) {
    return decodeFailure(error3.message, { field: 'right' })
  }

  return safeResult({
    operation: Number(operationResult.value),
    left: leftResult.value,
    right: rightResult.value,
  })
}
