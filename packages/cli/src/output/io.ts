/**
 * Where the CLI writes. Commands never touch process.stdout directly, so
 * tests can hand them a buffer instead.
 */
export interface CliIO {
  out(text: string): void
  err(text: string): void
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text + '\n')
  },
  err: (text) => {
    process.stderr.write(text + '\n')
  },
}
