import { NOT_AVAILABLE, isListValue } from '@rigging/kernel'
import type { AnalyzerState, ChangeEntry, ChangeSet, ParamValue } from '@rigging/kernel'
import type { Theme } from './theme.js'

const ARROW = '→'

function valueText(value: ParamValue | null): string {
  if (value === null) return NOT_AVAILABLE
  if (isListValue(value)) return value.join(', ')
  return String(value)
}

function analyzerDelta(before: AnalyzerState, after: AnalyzerState): string[] {
  const parts: string[] = []
  if (before.enabled !== after.enabled) {
    parts.push(`enabled ${String(before.enabled)} ${ARROW} ${String(after.enabled)}`)
  }
  if (before.value !== after.value) {
    parts.push(`value ${before.value ?? NOT_AVAILABLE} ${ARROW} ${after.value ?? NOT_AVAILABLE}`)
  }
  return parts
}

/**
 * One line of plain text per change entry.
 *
 *   [5] base/protocols/ssh: enabled false → true
 *   target_strings: N/A → 10.0.0.5:5044
 */
export function describeChange(entry: ChangeEntry): string {
  if (entry.kind === 'field') {
    return `${entry.field}: ${valueText(entry.old_value)} ${ARROW} ${valueText(entry.new_value)}`
  }
  const delta = analyzerDelta(entry.before, entry.after)
  return `[${entry.id}] ${entry.name}: ${delta.length > 0 ? delta.join(', ') : 'unchanged'}`
}

export function renderChanges(changes: ChangeSet, theme: Theme): string {
  if (changes.length === 0) {
    return theme.muted('No matching items; nothing changed.')
  }
  const noun = changes.length === 1 ? 'change' : 'changes'
  const lines = [theme.green(`${changes.length} ${noun} applied`)]
  for (const entry of changes) {
    lines.push('  ' + theme.text(describeChange(entry)))
  }
  return lines.join('\n')
}

/**
 * Text for an operation result handed to the print callback.
 * Returns null for results with nothing to show.
 */
export function formatResult(result: unknown): string | null {
  if (result === undefined || result === null) return null
  if (typeof result === 'string') return result
  if (typeof result === 'number' || typeof result === 'boolean') return String(result)
  return JSON.stringify(result, null, 2)
}
