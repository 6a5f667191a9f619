/**
 * Rigging Kernel — Analyzer Collection Interface
 *
 * Query when nothing is selected, mutate when something is:
 *
 * - No ids: a Report with one row per analyzer. Nothing changes.
 * - Ids: every analyzer whose id is selected is toggled and/or given a new
 *   value, then recorded in the ChangeSet. Unknown ids are ignored.
 *
 * When both --enable and --disable are given, enable wins. A new value is
 * stored with a trailing ';'.
 */

import type {
  Analyzer,
  AnalyzerCollection,
  AnalyzerState,
  ChangeEntry,
  MutationOutcome,
  Report,
} from '../types/change.js';
import { NOT_AVAILABLE } from '../types/change.js';
import type { FlagSpec, Grammar } from '../types/flag.js';
import type { ValueBag } from '../types/semantic.js';
import { isListValue } from '../types/semantic.js';
import type { ConfigInterface, ConfigInterfaceOptions } from './config-interface.js';

export const ANALYZER_REPORT_HEADERS: ReadonlyArray<string> = ['Id', 'Name', 'Enabled', 'Value'];

const IDS_FLAG: FlagSpec = {
  dest: 'analyzer_ids',
  flags: ['--ids'],
  required: false,
  value_type: 'int',
  multiplicity: 'many',
  help_text: 'Specify one or more ids for the config object you want to work with.',
  default: [],
};

const ENABLE_FLAG: FlagSpec = {
  dest: 'enable',
  flags: ['--enable'],
  required: false,
  value_type: 'none',
  multiplicity: 'single',
  help_text: 'Enable selected object.',
};

const DISABLE_FLAG: FlagSpec = {
  dest: 'disable',
  flags: ['--disable'],
  required: false,
  value_type: 'none',
  multiplicity: 'single',
  help_text: 'Disable selected object.',
};

const VALUE_FLAG: FlagSpec = {
  dest: 'value',
  flags: ['--value'],
  required: false,
  value_type: 'string',
  multiplicity: 'single',
  help_text: 'The value associated with the selected object.',
};

/** Append ';' unless already present. */
export function canonicalizeAnalyzerValue(value: string): string {
  return value.endsWith(';') ? value : value + ';';
}

function stateOf(analyzer: Analyzer): AnalyzerState {
  return {
    enabled: analyzer.enabled,
    value: analyzer.value !== undefined && analyzer.value !== '' ? analyzer.value : null,
  };
}

function selectedIds(values: ValueBag): ReadonlySet<number> {
  const raw = values['analyzer_ids'];
  if (raw === undefined || !isListValue(raw)) {
    return new Set();
  }
  const ids = new Set<number>();
  for (const id of raw) {
    if (typeof id === 'number') {
      ids.add(id);
    }
  }
  return ids;
}

export class AnalyzersInterface<C extends AnalyzerCollection> implements ConfigInterface<C> {
  readonly name: string;
  readonly description: string;

  constructor(
    readonly config: C,
    options: ConfigInterfaceOptions,
  ) {
    this.name = options.name;
    this.description = options.description ?? '';
  }

  /**
   * --ids, --enable, --disable, and --value when the collection's first
   * analyzer carries a value.
   */
  grammar(): Grammar {
    const first = this.config.analyzers[0];
    const withValue = first !== undefined && first.value !== undefined && first.value !== '';
    const flags = withValue
      ? [IDS_FLAG, ENABLE_FLAG, DISABLE_FLAG, VALUE_FLAG]
      : [IDS_FLAG, ENABLE_FLAG, DISABLE_FLAG];
    return { flags, skipped: [] };
  }

  report(): Report {
    return {
      headers: ANALYZER_REPORT_HEADERS,
      rows: this.config.analyzers.map((analyzer) => {
        const { enabled, value } = stateOf(analyzer);
        return [analyzer.id, analyzer.name, enabled, value ?? NOT_AVAILABLE];
      }),
    };
  }

  execute(values: ValueBag): MutationOutcome<C> {
    const ids = selectedIds(values);
    if (ids.size === 0) {
      return { kind: 'report', report: this.report() };
    }

    const enable = values['enable'] === true;
    const disable = values['disable'] === true;
    const rawValue = values['value'];
    const value = typeof rawValue === 'string' && rawValue !== '' ? canonicalizeAnalyzerValue(rawValue) : undefined;

    const changes: ChangeEntry[] = [];
    for (const analyzer of this.config.analyzers) {
      if (!ids.has(analyzer.id)) {
        continue;
      }
      const before = stateOf(analyzer);
      if (enable) {
        analyzer.enabled = true;
      } else if (disable) {
        analyzer.enabled = false;
      }
      if (value !== undefined) {
        analyzer.value = value;
      }
      changes.push({ kind: 'analyzer', id: analyzer.id, name: analyzer.name, before, after: stateOf(analyzer) });
    }

    return { kind: 'mutated', target: this.config, changes };
  }
}
