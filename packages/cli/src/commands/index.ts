/**
 * commands/index.ts — the rig program, configured and returned without parsing.
 *
 * Imported by:
 *   src/bin/rig.ts   (operator entry point)
 *   test/*.test.ts   (parsed against in-memory runtimes)
 */

import { Command } from 'commander'
import type { CliRuntime } from '../catalog.js'
import { applyCommandSettings, CommandFailedError, isDisplayExit } from '../grammar/parse.js'
import { processIO } from '../output/io.js'
import type { CliIO } from '../output/io.js'
import { t } from '../output/theme.js'
import type { Theme } from '../output/theme.js'
import { componentCommand } from './component.js'
import { describeCommand } from './describe.js'
import { historyCommand } from './history.js'

export const VERSION = '0.1.0'

export interface ProgramOptions {
  readonly runtime: CliRuntime
  readonly io?: CliIO | undefined
  readonly theme?: Theme | undefined
}

export function createProgram({ runtime, io = processIO, theme = t }: ProgramOptions): Command {
  const context = { runtime, io, theme }
  const program = applyCommandSettings(new Command('rig'), io)
    .description('Run component interfaces derived from their targets, and track configuration changes.')
    .version(VERSION)
    .option('--home <dir>', 'Rigging home (default: $RIGGING_HOME, then the remembered home, then ~/.rigging)')
    .option('--persist', 'Remember --home for later runs')

  for (const component of runtime.components) {
    program.addCommand(componentCommand(component, context))
  }
  program.addCommand(historyCommand(context))
  program.addCommand(describeCommand(context))
  return program
}

/**
 * The `--home` and `--persist` values, read before the program is built:
 * the home decides which stored configuration the grammars are derived from.
 */
export function scanHomeOptions(argv: ReadonlyArray<string>): { home?: string | undefined; persist: boolean } {
  let home: string | undefined
  let persist = false
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--') break
    if (arg === '--persist') persist = true
    else if (arg === '--home') home = argv[++i]
    else if (arg !== undefined && arg.startsWith('--home=')) home = arg.slice('--home='.length)
  }
  return { home, persist }
}

export function formatFailure(error: unknown): string {
  if (error instanceof CommandFailedError) {
    const prefix = error.commandPath === '' ? '[rig]' : `[rig ${error.commandPath}]`
    return `${prefix} ${error.message}`
  }
  return `[rig] ${error instanceof Error ? error.message : String(error)}`
}

/**
 * Parse `argv` (user arguments only) and run the selected command.
 *
 * @returns The process exit code
 */
export async function runProgram(
  program: Command,
  argv: ReadonlyArray<string>,
  io: CliIO = processIO,
  theme: Theme = t,
): Promise<number> {
  try {
    await program.parseAsync([...argv], { from: 'user' })
    return 0
  } catch (error) {
    if (isDisplayExit(error)) {
      return error.exitCode
    }
    io.err(theme.red(formatFailure(error)))
    return 1
  }
}
