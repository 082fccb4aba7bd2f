/**
 * Calculator Program Package Exports
 */

// Logger
export { logger } from '@bytecalc/core'
// Re-export types from centralized types package
export * from '@bytecalc/types'
// Configuration constants
export {
  DEFAULT_OVERFLOW_POLICY,
  DEFAULT_PROGRAM_ID,
  EXPONENT_CONFIG,
  I64_CONFIG,
  PROGRAM_LOG_PREFIX,
} from './config'
export { processInstruction } from './entrypoint'
export {
  createInstructionContext,
  defaultProgramLog,
  disassemble,
  evaluate,
  registry,
} from './evaluate'
export * from './instructions/arithmetic'
export {
  BaseInstruction,
  type CalculatorInstructionHandler,
} from './instructions/base'
export { InstructionRegistry } from './instructions/registry'
export { type InvokeOptions, invokeProgram } from './invoke'
