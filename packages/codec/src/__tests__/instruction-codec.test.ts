/**
 * Instruction Payload Codec Tests
 */

import { bytesToHex, hexToBytes } from 'viem'
import { CALCULATOR_ERRORS, type Instruction } from '@bytecalc/types'
import { describe, expect, it } from 'vitest'
import {
  decodeInstruction,
  encodeInstruction,
  INSTRUCTION_SIZE,
} from '../calculator/instruction'

describe('Instruction codec', () => {
  it('should lay out 17 bytes: selector, left, right', () => {
    const [error, bytes] = encodeInstruction({
      operation: 0,
      left: 10n,
      right: 5n,
    })
    expect(error).toBeUndefined()
    expect(INSTRUCTION_SIZE).toBe(17)
    expect(bytes && bytesToHex(bytes)).toBe(
      '0x000a000000000000000500000000000000',
    )
  })

  it('should encode negative operands as two\'s complement', () => {
    const [, bytes] = encodeInstruction({ operation: 5, left: 3n, right: -1n })
    expect(bytes && bytesToHex(bytes)).toBe(
      '0x050300000000000000ffffffffffffffff',
    )
  })

  it('should decode a hand-written payload', () => {
    const data = hexToBytes('0x0314000000000000000800000000000000')
    expect(decodeInstruction(data)).toEqual([
      undefined,
      { operation: 3, left: 20n, right: 8n },
    ])
  })

  it('should keep unknown selectors for dispatch to reject', () => {
    const data = new Uint8Array(17)
    data[0] = 0xff
    const [, instruction] = decodeInstruction(data)
    expect(instruction?.operation).toBe(255)
  })

  it('should round-trip instructions across the field ranges', () => {
    const instructions: Instruction[] = [
      { operation: 0, left: 0n, right: 0n },
      { operation: 2, left: -(2n ** 63n), right: 2n ** 63n - 1n },
      { operation: 4, left: -123_456_789n, right: 987_654_321n },
      { operation: 255, left: -1n, right: 1n },
    ]
    for (const instruction of instructions) {
      const [encodeError, bytes] = encodeInstruction(instruction)
      expect(encodeError).toBeUndefined()
      if (!bytes) continue
      expect(decodeInstruction(bytes)).toEqual([undefined, instruction])
    }
  })

  it('should fail every length other than 17 with DecodeError', () => {
    for (const length of [0, 1, 9, 16, 18, 32]) {
      const [error, instruction] = decodeInstruction(new Uint8Array(length))
      expect(instruction).toBeUndefined()
      expect(error?.code).toBe(CALCULATOR_ERRORS.DECODE_ERROR)
      expect(error?.message).toBe(
        `Invalid instruction payload length: expected 17 bytes, got ${length}`,
      )
    }
  })

  it('should refuse to encode out-of-range fields', () => {
    const [opError] = encodeInstruction({ operation: 256, left: 0n, right: 0n })
    expect(opError?.code).toBe(CALCULATOR_ERRORS.DECODE_ERROR)
    expect(opError?.context).toEqual({ field: 'operation' })

    const [leftError] = encodeInstruction({
      operation: 0,
      left: 2n ** 63n,
      right: 0n,
    })
    expect(leftError?.context).toEqual({ field: 'left' })

    const [rightError] = encodeInstruction({
      operation: 0,
      left: 0n,
      right: -(2n ** 63n) - 1n,
    })
    expect(rightError?.context).toEqual({ field: 'right' })
  })
})
