/**
 * Validation Utilities
 */

/**
 * Validates a 0x-prefixed hex string of whole bytes
 */
export function isValidHex(value: string): boolean {
  return /^0x([0-9a-fA-F]{2})*$/.test(value)
}
