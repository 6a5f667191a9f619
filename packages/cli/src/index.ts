/**
 * @rigging/cli
 *
 * The rig program: one command per registered component interface, plus
 * `history` and `describe`.
 *
 * Usage:
 *   rig --help
 *   rig sensor install --network-interfaces eth0
 *   rig sensor process start
 *   rig sensor scripts --ids 5 8 --enable
 *   rig sensor sink --target-strings 10.0.0.5:5044 --enable
 *   rig history [--interface <name>] [--limit <n>] [--json]
 *   rig describe sensor process
 */

export { buildRuntime, FIRST_PARTY_COMPONENTS } from './catalog.js'
export type { CliRuntime, ComponentEntry, RuntimeOptions } from './catalog.js'
export { createProgram, formatFailure, runProgram, scanHomeOptions, VERSION } from './commands/index.js'
export type { ProgramOptions } from './commands/index.js'
export { runInterface } from './commands/component.js'
export type { CommandContext } from './commands/component.js'
export { describeGrammar } from './commands/describe.js'
export { bindGrammar } from './grammar/commander.js'
export type { GrammarBinding, ParsedValues } from './grammar/commander.js'
export { CommandFailedError, isDisplayExit, toUsageError } from './grammar/parse.js'
export { describeChange, formatResult, renderChanges } from './output/changes.js'
export { renderTable } from './output/table.js'
export { createTheme, plain, t } from './output/theme.js'
export type { Theme } from './output/theme.js'
export type { CliIO } from './output/io.js'
export { processIO } from './output/io.js'
