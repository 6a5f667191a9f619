/**
 * Rigging CLI — Parse Errors
 *
 * Commander reports parse failures as CommanderError. Help and version
 * output also arrive that way, with exit code 0 (or 1 for help shown in
 * place of a missing subcommand); those are displays, not errors.
 *
 * Every real failure is wrapped in a CommandFailedError that carries the
 * command path, so the top level can print `[rig <command>] <message>`.
 */

import { CommanderError } from 'commander'
import type { Command } from 'commander'
import { UsageError } from '@rigging/kernel'
import type { CliIO } from '../output/io.js'

const DISPLAY_CODES: ReadonlySet<string> = new Set([
  'commander.help',
  'commander.helpDisplayed',
  'commander.version',
])

export function isDisplayExit(error: unknown): error is CommanderError {
  return error instanceof CommanderError && DISPLAY_CODES.has(error.code)
}

/** `error: unknown option '--x'` → UsageError(`unknown option '--x'`) */
export function toUsageError(error: CommanderError): UsageError {
  return new UsageError(error.message.replace(/^error: /, ''))
}

export class CommandFailedError extends Error {
  constructor(
    readonly commandPath: string,
    readonly error: unknown,
  ) {
    super(error instanceof Error ? error.message : String(error))
    this.name = 'CommandFailedError'
  }
}

/** `rig sensor process` → `sensor process`; the root itself is ''. */
export function commandPath(command: Command): string {
  const names: string[] = []
  for (let current: Command | null = command; current !== null; current = current.parent) {
    names.unshift(current.name())
  }
  return names.slice(1).join(' ')
}

/**
 * Route output through `io`, suppress commander's own error printing, and
 * turn parse failures into CommandFailedError. Subcommands added with
 * addCommand() do not inherit these settings; apply them to each.
 */
export function applyCommandSettings(command: Command, io: CliIO): Command {
  return command
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
      outputError: () => undefined,
    })
    .exitOverride((error) => {
      if (isDisplayExit(error)) throw error
      throw new CommandFailedError(commandPath(command), toUsageError(error))
    })
}
