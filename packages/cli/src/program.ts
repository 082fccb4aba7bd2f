import { Command } from 'commander'
import { createEncodeCommand } from './commands/encode'
import { createInspectCommand } from './commands/inspect'
import { createRunCommand } from './commands/run'
import { type CliOutput, consoleOutput } from './utils/output'

export const CLI_VERSION = '0.1.0'

export function createProgram(output: CliOutput = consoleOutput): Command {
  return new Command('bytecalc')
    .description('Encode, inspect and run byte calculator instructions')
    .version(CLI_VERSION)
    .addCommand(createRunCommand(output))
    .addCommand(createEncodeCommand(output))
    .addCommand(createInspectCommand(output))
}
