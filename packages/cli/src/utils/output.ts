/**
 * Where command results are written. Commands take an output so tests
 * can collect lines instead of printing them.
 */
export interface CliOutput {
  out(line: string): void
  err(line: string): void
}

export const consoleOutput: CliOutput = {
  out: (line) => {
    console.log(line)
  },
  err: (line) => {
    console.error(line)
  },
}
