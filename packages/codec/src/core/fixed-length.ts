/**
 * Fixed-Length Integer Serialization
 *
 * encode[l](x) ≡ ⟨⟩                                  when l = 0
 * encode[l](x) ≡ ⟨x mod 256⟩ ∥ encode[l-1](⌊x/256⌋)  otherwise
 *
 * Values are encoded in regular little-endian fashion, always using
 * exactly l bytes. Signed values are written as their two's complement
 * bit pattern of the same width.
 *
 * Example: encode[4](0x12345678) = [0x78, 0x56, 0x34, 0x12]
 */

import type { DecodingResult, FixedLengthSize, Safe } from '@bytecalc/types'
import { safeError, safeResult } from '@bytecalc/types'

/**
 * Encode natural number using fixed-length little-endian encoding
 *
 * @param value - Natural number to encode
 * @param length - Fixed length in bytes (1, 2, 4, or 8)
 * @returns Encoded octet sequence of specified length
 */
export function encodeFixedLength(
  value: bigint,
  length: FixedLengthSize,
): Safe<Uint8Array> {
  if (value < 0n) {
    return safeError(new Error(`Natural number cannot be negative: ${value}`))
  }

  const lengthNum = Number(length)
  const maxValue = 2n ** (8n * length) - 1n
  if (value > maxValue) {
    return safeError(
      new Error(
        `Value ${value} exceeds maximum for ${lengthNum}-byte encoding: ${maxValue}`,
      ),
    )
  }

  const result = new Uint8Array(lengthNum)

  // Little-endian encoding
  for (let i = 0; i < lengthNum; i++) {
    result[i] = Number((value >> (8n * BigInt(i))) & 0xffn)
  }

  return safeResult(result)
}

/**
 * Decode natural number from fixed-length little-endian encoding
 *
 * @param data - Octet sequence to decode
 * @param length - Expected length in bytes
 * @returns Decoded natural number and remaining data
 */
export function decodeFixedLength(
  data: Uint8Array,
  length: FixedLengthSize,
): Safe<DecodingResult<bigint>> {
  const lengthNum = Number(length)
  if (data.length < lengthNum) {
    return safeError(
      new Error(
        `Insufficient data for ${lengthNum}-byte decoding (got ${data.length} bytes)`,
      ),
    )
  }

  let value = 0n

  // Little-endian decoding
  for (let i = 0; i < lengthNum; i++) {
    value |= BigInt(data[i]) << BigInt(8 * i)
  }

  return safeResult({
    value,
    remaining: data.slice(lengthNum),
    consumed: lengthNum,
  })
}

/**
 * Encode a signed integer as its l-byte two's complement, little-endian
 *
 * @param value - Integer in [-2^(8l-1), 2^(8l-1) - 1]
 * @param length - Fixed length in bytes
 */
export function encodeSignedFixedLength(
  value: bigint,
  length: FixedLengthSize,
): Safe<Uint8Array> {
  const bits = 8n * length
  const min = -(2n ** (bits - 1n))
  const max = 2n ** (bits - 1n) - 1n
  if (value < min || value > max) {
    return safeError(
      new Error(
        `Value ${value} is outside the signed ${bits}-bit range [${min}, ${max}]`,
      ),
    )
  }

  return encodeFixedLength(BigInt.asUintN(Number(bits), value), length)
}

/**
 * Decode an l-byte little-endian two's complement integer
 *
 * @param data - Octet sequence to decode
 * @param length - Expected length in bytes
 * @returns Decoded signed integer and remaining data
 */
export function decodeSignedFixedLength(
  data: Uint8Array,
  length: FixedLengthSize,
): Safe<DecodingResult<bigint>> {
  const [error, result] = decodeFixedLength(data, length)
  if (error) {
    return safeError(error)
  }

  return safeResult({
    ...result,
    value: BigInt.asIntN(Number(8n * length), result.value),
  })
}
