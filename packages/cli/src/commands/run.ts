import { loadCalculatorEnv, logger, z } from '@bytecalc/core'
import { invokeProgram } from '@bytecalc/program'
import { OVERFLOW_POLICIES } from '@bytecalc/types'
import { Command } from 'commander'
import { type CliOutput, consoleOutput } from '../utils/output'
import { readPayload } from '../utils/payload'

const runOptionsSchema = z.object({
  file: z.string().optional(),
  overflow: z.enum(OVERFLOW_POLICIES).optional(),
})

export type RunCommandOptions = z.infer<typeof runOptionsSchema>

export function createRunCommand(output: CliOutput = consoleOutput): Command {
  const command = new Command('run')
    .description('Decode an instruction payload and run the calculator program')
    .argument('[payload]', 'Instruction payload as hex (0x prefix optional)')
    .option('--file <path>', 'Read the payload bytes from a file')
    .option(
      '--overflow <policy>',
      'Overflow policy: wrap or trap (default: $BYTECALC_OVERFLOW or wrap)',
    )
    .action(async (payload: string | undefined, options: unknown) => {
      process.exitCode = await executeRunCommand(payload, options, output)
    })

  return command
}

/**
 * @returns process exit code: 0 when the program succeeded, 1 otherwise
 */
export async function executeRunCommand(
  payload: string | undefined,
  options: unknown,
  output: CliOutput = consoleOutput,
): Promise<number> {
  const parsed = runOptionsSchema.safeParse(options)
  if (!parsed.success) {
    output.err(
      `Error: ${parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
    )
    return 1
  }

  const [payloadError, data] = await readPayload({
    hex: payload,
    file: parsed.data.file,
  })
  if (payloadError) {
    output.err(`Error: ${payloadError.message}`)
    return 1
  }

  const [envError, env] = loadCalculatorEnv()
  if (envError) {
    output.err(`Error: ${envError.message}`)
    return 1
  }

  const overflow = parsed.data.overflow ?? env.BYTECALC_OVERFLOW
  logger.debug('Invoking calculator program', {
    bytes: data.length,
    overflow,
  })

  const invocation = invokeProgram(data, { overflow })
  for (const line of invocation.logs) {
    output.out(line)
  }

  if (invocation.error) {
    output.err(`Error: ${invocation.error.code}: ${invocation.error.message}`)
    return 1
  }
  return 0
}
