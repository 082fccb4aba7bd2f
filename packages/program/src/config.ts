/**
 * Calculator Program Configuration Constants
 */

import type { OverflowPolicy } from '@bytecalc/types'

// Signed 64-bit operand and result range
export const I64_CONFIG = {
  BITS: 64,
  MIN: -(2n ** 63n), // -9223372036854775808
  MAX: 2n ** 63n - 1n, // 9223372036854775807
} as const

// Power exponents are narrowed to u32 under the wrap policy
export const EXPONENT_CONFIG = {
  BITS: 32,
  MAX: 2n ** 32n - 1n,
} as const

export const DEFAULT_OVERFLOW_POLICY: OverflowPolicy = 'wrap'

// Placeholder id reported when the caller does not name the program
export const DEFAULT_PROGRAM_ID = 'bytecalc-program'

// Prefix the host puts in front of every program log line
export const PROGRAM_LOG_PREFIX = 'Program log: '
