/**
 * Codec Types
 *
 * Shared shapes for the fixed-layout binary codec
 */

/**
 * Byte widths supported by the fixed-length integer codec
 */
export type FixedLengthSize = 1n | 2n | 4n | 8n

export interface DecodingResult<T> {
  value: T
  remaining: Uint8Array
  consumed: number
}
