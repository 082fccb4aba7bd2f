import { decodeInstruction } from '@bytecalc/codec'
import { disassemble } from '@bytecalc/program'
import { Command } from 'commander'
import { type CliOutput, consoleOutput } from '../utils/output'
import { readPayload } from '../utils/payload'

export function createInspectCommand(
  output: CliOutput = consoleOutput,
): Command {
  return new Command('inspect')
    .description('Decode an instruction payload without running it')
    .argument('[payload]', 'Instruction payload as hex (0x prefix optional)')
    .option('--file <path>', 'Read the payload bytes from a file')
    .action(async (payload: string | undefined, options: { file?: string }) => {
      process.exitCode = await executeInspectCommand(
        payload,
        options.file,
        output,
      )
    })
}

export async function executeInspectCommand(
  payload: string | undefined,
  file: string | undefined,
  output: CliOutput = consoleOutput,
): Promise<number> {
  const [payloadError, data] = await readPayload({ hex: payload, file })
  if (payloadError) {
    output.err(`Error: ${payloadError.message}`)
    return 1
  }

  const [decodeError, instruction] = decodeInstruction(data)
  if (decodeError) {
    output.err(`Error: ${decodeError.code}: ${decodeError.message}`)
    return 1
  }

  output.out(disassemble(instruction))
  return 0
}
