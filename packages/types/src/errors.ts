/**
 * Calculator Error Constants
 *
 * Every failure the program can report. The values double as the
 * `code` of a {@link CalculatorError} and as the name printed by the CLI.
 */

export const CALCULATOR_ERRORS = {
  DECODE_ERROR: 'DecodeError',
  UNKNOWN_OPERATION: 'UnknownOperation',
  DIVISION_BY_ZERO: 'DivisionByZero',
  NEGATIVE_EXPONENT: 'NegativeExponent',
  ARITHMETIC_OVERFLOW: 'ArithmeticOverflow',
} as const

export type CalculatorErrorCode =
  (typeof CALCULATOR_ERRORS)[keyof typeof CALCULATOR_ERRORS]

export class CalculatorError extends Error {
  readonly code: CalculatorErrorCode
  readonly context?: Record<string, unknown>

  constructor(
    code: CalculatorErrorCode,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'CalculatorError'
    this.code = code
    this.context = context
  }
}
