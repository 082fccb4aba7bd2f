/**
 * In-process Program Invocation
 *
 * Runs the program the way a host runtime would for a single-instruction
 * transaction: logs are collected with the host's "Program log: " prefix
 * and the outcome is reported as success or failure.
 */

import type {
  EvaluateOptions,
  ProgramInvocation,
  ProgramLog,
} from '@bytecalc/types'
import { DEFAULT_PROGRAM_ID, PROGRAM_LOG_PREFIX } from './config'
import { processInstruction } from './entrypoint'

export interface InvokeOptions extends EvaluateOptions {
  programId?: string
}

export function invokeProgram(
  instructionData: Uint8Array,
  options: InvokeOptions = {},
): ProgramInvocation {
  const logs: string[] = []
  const log: ProgramLog = (message) => {
    logs.push(`${PROGRAM_LOG_PREFIX}${message}`)
    options.log?.(message)
  }

  const [error, result] = processInstruction(
    options.programId ?? DEFAULT_PROGRAM_ID,
    [],
    instructionData,
    { overflow: options.overflow, log },
  )
  if (error) {
    return { status: 'failed', error, logs }
  }

  return { status: 'success', result, logs }
}
