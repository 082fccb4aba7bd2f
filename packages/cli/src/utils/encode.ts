import { encodeInstruction } from '@bytecalc/codec'
import { encodeHex, type Hex } from '@bytecalc/core'
import type { Safe } from '@bytecalc/types'
import { safeError, safeResult } from '@bytecalc/types'
import { parseOperand, parseOperation } from './validation'

/**
 * Build the hex payload for textual operation and operands
 */
export function encodeCalculatorPayload(
  operation: string,
  left: string,
  right: string,
): Safe<Hex> {
  const [operationError, selector] = parseOperation(operation)
  if (operationError) {
    return safeError(operationError)
  }

  const [leftError, leftValue] = parseOperand(left)
  if (leftError) {
    return safeError(leftError)
  }

  const [rightError, rightValue] = parseOperand(right)
  if (rightError) {
    return safeError(rightError)
  }

  const [encodeError, bytes] = encodeInstruction({
    operation: selector,
    left: leftValue,
    right: rightValue,
  })
  if (encodeError) {
    return safeError(encodeError)
  }

  return safeResult(encodeHex(bytes))
}
