#!/usr/bin/env node
/**
 * bin/rig.ts — entry point for the `rig` command.
 *
 * Resolves the rigging home (--home, then RIGGING_HOME, then the remembered
 * home, then ~/.rigging), builds the runtime over it, and runs the program.
 */

import { FileStateIO, resolveRiggingHome } from '@rigging/runtime-host'
import { buildRuntime } from '../catalog.js'
import { createProgram, runProgram, scanHomeOptions } from '../commands/index.js'

const argv = process.argv.slice(2)
const { home, persist } = scanHomeOptions(argv)
const stateIO = new FileStateIO(resolveRiggingHome({ home, persist }))
const program = createProgram({ runtime: buildRuntime(stateIO) })

process.exitCode = await runProgram(program, argv)
