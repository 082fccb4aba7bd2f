/**
 * Program Entry Point
 *
 * The host calls processInstruction with the program id, the accounts
 * passed to the transaction and the raw instruction data. This program
 * keeps no state, so the id and accounts are accepted and ignored.
 */

import { decodeInstruction } from '@bytecalc/codec'
import type { EvaluateOptions, InstructionResult } from '@bytecalc/types'
import { safeError } from '@bytecalc/types'
import { defaultProgramLog, evaluate } from './evaluate'

export function processInstruction(
  _programId: string,
  _accounts: readonly unknown[],
  instructionData: Uint8Array,
  options: EvaluateOptions = {},
): InstructionResult {
  const log = options.log ?? defaultProgramLog

  const [decodeError, instruction] = decodeInstruction(instructionData)
  if (decodeError) {
    log(`Invalid instruction data: ${decodeError.message}`)
    return safeError(decodeError)
  }

  return evaluate(instruction, { ...options, log })
}
