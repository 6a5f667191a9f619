/**
 * rig <component> <interface> — run one registered interface
 *
 * Usage:
 *   rig sensor install --network-interfaces eth0 eth1
 *   rig sensor process start [--verbose] [--pretty-print-status]
 *   rig sensor scripts [--ids <id...>] [--enable | --disable]
 *   rig sensor sink [--target-strings <value...>] [--enable | --disable]
 *
 * Manager interfaces are dispatched; the result is printed when the
 * interface prints. Config interfaces either print their report or commit
 * the mutated object and log the change set.
 */

import { Command } from 'commander'
import { dispatch } from '@rigging/kernel'
import type { ValueBag } from '@rigging/kernel'
import type { RegisteredInterface } from '@rigging/target-loader'
import type { CliRuntime, ComponentEntry } from '../catalog.js'
import { bindGrammar } from '../grammar/commander.js'
import { applyCommandSettings, CommandFailedError, commandPath } from '../grammar/parse.js'
import { formatResult, renderChanges } from '../output/changes.js'
import type { CliIO } from '../output/io.js'
import { renderTable } from '../output/table.js'
import type { Theme } from '../output/theme.js'

export interface CommandContext {
  readonly runtime: CliRuntime
  readonly io: CliIO
  readonly theme: Theme
}

export async function runInterface(
  component: ComponentEntry,
  entry: RegisteredInterface,
  values: ValueBag,
  { runtime, io, theme }: CommandContext,
): Promise<void> {
  if (entry.kind === 'config') {
    const outcome = entry.iface.execute(values)
    if (outcome.kind === 'report') {
      io.out(renderTable(outcome.report, theme))
      return
    }
    entry.commit()
    runtime.changeLogger.recordOutcome(`${component.name} ${entry.iface.name}`, outcome)
    io.out(renderChanges(outcome.changes, theme))
    return
  }

  const print = (result: unknown): void => {
    const text = formatResult(result)
    if (text !== null) io.out(text)
  }

  const followUp = component.statusFollowUp
  if (followUp !== undefined && followUp.iface === entry.iface.name && values['action'] !== followUp.action) {
    await dispatch(entry.iface, values)
    await dispatch(entry.iface, { ...values, action: followUp.action }, { print })
    return
  }
  await dispatch(entry.iface, values, { print })
}

function interfaceCommand(component: ComponentEntry, entry: RegisteredInterface, context: CommandContext): Command {
  const command = applyCommandSettings(new Command(entry.iface.name), context.io)
  if (entry.iface.description !== '') {
    command.description(entry.iface.description)
  }
  const binding = bindGrammar(command, entry.iface.grammar())
  command.action(async () => {
    try {
      const values = { ...binding.read(command), sub_interface: entry.iface.name }
      await runInterface(component, entry, values, context)
    } catch (error) {
      throw new CommandFailedError(commandPath(command), error)
    }
  })
  return command
}

export function componentCommand(component: ComponentEntry, context: CommandContext): Command {
  const command = applyCommandSettings(new Command(component.name), context.io).description(component.description)
  for (const entry of context.runtime.registry.forComponent(component.name)) {
    command.addCommand(interfaceCommand(component, entry, context))
  }
  return command
}
