import { readFile } from 'node:fs/promises'
import { decodeHex } from '@bytecalc/core'
import type { SafePromise } from '@bytecalc/types'
import { safeError, safeResult, safeTry } from '@bytecalc/types'
import { isValidHexPayload } from './validation'

export interface PayloadSource {
  hex?: string
  file?: string
}

/**
 * Resolve the instruction payload from a hex argument or a binary file
 */
export async function readPayload(
  source: PayloadSource,
): SafePromise<Uint8Array> {
  if (source.file !== undefined && source.hex !== undefined) {
    return safeError(
      new Error('Pass either a hex payload or --file <path>, not both'),
    )
  }

  if (source.file !== undefined) {
    const [error, contents] = await safeTry(readFile(source.file))
    if (error) {
      return safeError(
        new Error(`Failed to read payload file ${source.file}: ${error.message}`),
      )
    }
    return safeResult(new Uint8Array(contents))
  }

  if (source.hex === undefined) {
    return safeError(new Error('A hex payload or --file <path> is required'))
  }

  if (!isValidHexPayload(source.hex)) {
    return safeError(
      new Error(`Invalid payload: ${source.hex} is not a hex string of whole bytes`),
    )
  }

  return safeResult(decodeHex(source.hex))
}
