import { Command } from 'commander'
import { encodeCalculatorPayload } from '../utils/encode'
import { type CliOutput, consoleOutput } from '../utils/output'

export function createEncodeCommand(output: CliOutput = consoleOutput): Command {
  return new Command('encode')
    .description('Print the hex payload for an instruction')
    .argument('<operation>', 'add, sub, mul, div, mod, pow or a selector 0-255')
    .argument('<left>', 'Left operand (signed 64-bit)')
    .argument('<right>', 'Right operand (signed 64-bit)')
    // negative operands such as -1 stay positional
    .allowUnknownOption()
    .allowExcessArguments(false)
    .action((operation: string, left: string, right: string) => {
      process.exitCode = executeEncodeCommand(operation, left, right, output)
    })
}

export function executeEncodeCommand(
  operation: string,
  left: string,
  right: string,
  output: CliOutput = consoleOutput,
): number {
  const [error, hex] = encodeCalculatorPayload(operation, left, right)
  if (error) {
    output.err(`Error: ${error.message}`)
    return 1
  }
  output.out(hex)
  return 0
}
