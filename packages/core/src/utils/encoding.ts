/**
 * Encoding Utilities
 *
 * Hex conversion for payloads passed on the command line
 */

import { bytesToHex, type Hex, hexToBytes } from 'viem'
import { isValidHex } from './validation'

export type { Hex }

/**
 * Encode Uint8Array to a 0x-prefixed hex string
 */
export function encodeHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes)
}

/**
 * Decode a hex string, with or without 0x prefix, to Uint8Array
 */
export function decodeHex(hex: string): Uint8Array {
  const prefixed = normalizeHex(hex)
  if (!isValidHex(prefixed)) {
    throw new Error(`Invalid hex string: ${hex}`)
  }
  return hexToBytes(prefixed)
}

/**
 * Add the 0x prefix when missing and drop surrounding whitespace
 */
export function normalizeHex(hex: string): Hex {
  const trimmed = hex.trim()
  return trimmed.startsWith('0x') ? `0x${trimmed.slice(2)}` : `0x${trimmed}`
}
