/**
 * Rigging CLI — Grammar Binding
 *
 * Projects a kernel Grammar onto a commander Command and reads the parsed
 * result back as a ValueBag keyed by FlagSpec dest.
 *
 * Commander only collects raw strings. Coercion, defaults and required
 * checks stay in the kernel (coerceValue, normalizeValues), so a grammar
 * behaves the same whether its values come from argv or from code.
 *
 * Every switch of a FlagSpec becomes its own Option; aliases are hidden
 * from help. The action selector becomes an optional positional argument
 * so that a missing or invalid action is reported by the interface itself.
 */

import { Option } from 'commander'
import type { Command } from 'commander'
import { coerceValue } from '@rigging/kernel'
import type { FlagSpec, Grammar, ParamValue } from '@rigging/kernel'

export type ParsedValues = Record<string, ParamValue | undefined>

export interface GrammarBinding {
  readonly grammar: Grammar
  /** Values of the last parse, one key per FlagSpec dest, plus `action` when the grammar has one. */
  read(command: Command): ParsedValues
}

const METAVARS: Record<FlagSpec['value_type'], string> = {
  string: 'value',
  int:    'int',
  float:  'number',
  none:   '',
}

function optionFlags(spec: FlagSpec, flag: string): string {
  if (spec.value_type === 'none') return flag
  const metavar = METAVARS[spec.value_type]
  return spec.multiplicity === 'many' ? `${flag} <${metavar}...>` : `${flag} <${metavar}>`
}

function optionHelp(spec: FlagSpec): string {
  const notes: string[] = []
  if (spec.required) notes.push('required')
  if (spec.default !== undefined && !(Array.isArray(spec.default) && spec.default.length === 0)) {
    notes.push(`default: ${JSON.stringify(spec.default)}`)
  }
  return notes.length > 0 ? `${spec.help_text} (${notes.join(', ')})`.trim() : spec.help_text
}

function toValue(spec: FlagSpec, raw: unknown): ParamValue | undefined {
  if (raw === undefined) return undefined
  if (spec.value_type === 'none') return raw === true
  const texts = (Array.isArray(raw) ? raw : [raw]).filter((item): item is string => typeof item === 'string')
  if (spec.multiplicity === 'many') {
    return texts.map((text) => coerceValue(spec, text))
  }
  const text = texts[0]
  return text === undefined ? undefined : coerceValue(spec, text)
}

/**
 * Add the grammar's options and action argument to `command`.
 */
export function bindGrammar(command: Command, grammar: Grammar): GrammarBinding {
  const options = new Map<string, Option[]>()

  for (const spec of grammar.flags) {
    const bound = spec.flags.map((flag, i) => {
      const option = new Option(optionFlags(spec, flag), optionHelp(spec))
      if (i > 0) option.hideHelp()
      command.addOption(option)
      return option
    })
    options.set(spec.dest, bound)
  }

  if (grammar.action !== undefined) {
    const choices = grammar.action.choices.join(', ')
    command.argument('[action]', `${grammar.action.help_text} (${choices})`)
  }

  return {
    grammar,
    read(parsed: Command): ParsedValues {
      const values: ParsedValues = {}
      for (const spec of grammar.flags) {
        let raw: unknown
        for (const option of options.get(spec.dest) ?? []) {
          const value: unknown = parsed.getOptionValue(option.attributeName())
          if (value !== undefined) {
            raw = value
            break
          }
        }
        values[spec.dest] = toValue(spec, raw)
      }
      if (grammar.action !== undefined) {
        values['action'] = parsed.args[0]
      }
      return values
    },
  }
}
