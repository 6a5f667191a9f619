/**
 * rig describe <component> <interface> — print an interface's grammar
 *
 * One JSON line per FlagSpec in grammar order, then the action choices,
 * then every FlagSpec dropped by a switch collision, then the grammar
 * fingerprint. The output is stable across runs for the same grammar.
 */

import { Command } from 'commander'
import { UsageError, describeFlagSpec, hashGrammar } from '@rigging/kernel'
import type { Grammar } from '@rigging/kernel'
import { applyCommandSettings, CommandFailedError, commandPath } from '../grammar/parse.js'
import type { CommandContext } from './component.js'

export function describeGrammar(grammar: Grammar): string[] {
  const lines = grammar.flags.map(describeFlagSpec)
  if (grammar.action !== undefined) {
    lines.push(`action: ${grammar.action.choices.join(' | ')}`)
  }
  for (const spec of grammar.skipped) {
    lines.push(`skipped: ${describeFlagSpec(spec)}`)
  }
  lines.push(`grammar: ${hashGrammar(grammar)}`)
  return lines
}

export function describeCommand({ runtime, io }: CommandContext): Command {
  const command = applyCommandSettings(new Command('describe'), io)
    .description('Print the flags an interface accepts')
    .argument('<component>', 'Component name (e.g. sensor)')
    .argument('<interface>', 'Interface name (e.g. process)')

  command.action((component: string, name: string) => {
    try {
      const components = runtime.registry.components()
      if (!components.includes(component)) {
        throw new UsageError(`unknown component '${component}' (available: ${components.join(', ')})`)
      }
      const entry = runtime.registry.get(component, name)
      if (entry === undefined) {
        const available = runtime.registry.list().map((e) => `${e.component} ${e.iface.name}`)
        throw new UsageError(`unknown interface '${component} ${name}' (available: ${available.join(', ')})`)
      }
      for (const line of describeGrammar(entry.iface.grammar())) {
        io.out(line)
      }
    } catch (error) {
      throw new CommandFailedError(commandPath(command), error)
    }
  })
  return command
}
