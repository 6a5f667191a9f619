/**
 * Rigging Kernel — Target Configuration Interface
 *
 * Every declared field except `enabled` becomes an optional flag; then
 * --enable and --disable. On execute:
 *
 * - a non-empty value is assigned and recorded (old → new)
 * - an empty value adds a report row with the field's current value
 * - enable/disable is applied last (enable wins) and always recorded
 *
 * With nothing recorded the pass is a query: the report gains an `enabled`
 * row and is returned instead of the object.
 */

import type { InterfaceDefaults } from '../assembly/interfaces.js';
import { mergeFlagSpecs } from '../assembly/merge.js';
import { mapParameter } from '../mapping/flag-mapper.js';
import { RESERVED_NAMES } from '../types/descriptor.js';
import type { ChangeEntry, MutationOutcome, ReportCell, TargetConfigObject } from '../types/change.js';
import { NOT_AVAILABLE } from '../types/change.js';
import type { FlagSpec, Grammar } from '../types/flag.js';
import type { ParamValue, ValueBag } from '../types/semantic.js';
import { isEmptyValue, isListValue, ParamType } from '../types/semantic.js';
import type { ConfigInterface, ConfigInterfaceOptions } from './config-interface.js';
import { toOptionLabel } from './config-interface.js';

export const TARGET_REPORT_HEADERS: ReadonlyArray<string> = ['Config Option', 'Value'];

const TOGGLES: ReadonlyArray<FlagSpec> = [
  {
    dest: 'enable',
    flags: ['--enable'],
    required: false,
    value_type: 'none',
    multiplicity: 'single',
    help_text: 'Enable selected target.',
  },
  {
    dest: 'disable',
    flags: ['--disable'],
    required: false,
    value_type: 'none',
    multiplicity: 'single',
    help_text: 'Disable selected target.',
  },
];

export interface TargetConfigInterfaceOptions extends ConfigInterfaceOptions {
  /** Keys supplied by the caller, never treated as field edits. */
  readonly defaults?: InterfaceDefaults | undefined;
}

function toCell(value: ParamValue | undefined): ReportCell {
  if (value === undefined || isEmptyValue(value)) {
    return NOT_AVAILABLE;
  }
  return isListValue(value) ? value.join(', ') : value;
}

export class TargetConfigInterface<C extends TargetConfigObject> implements ConfigInterface<C> {
  readonly name: string;
  readonly description: string;
  readonly defaults: InterfaceDefaults;

  constructor(
    readonly config: C,
    options: TargetConfigInterfaceOptions,
  ) {
    this.name = options.name;
    this.description = options.description ?? '';
    this.defaults = options.defaults ?? {};
  }

  grammar(): Grammar {
    const fieldFlags = this.config
      .fields()
      .filter((field) => field.name !== 'enabled' && !RESERVED_NAMES.has(field.name))
      .map((field) =>
        mapParameter(
          {
            name: field.name,
            semantic_type: field.type.kind === 'optional' ? field.type : ParamType.optional(field.type),
            description: field.description,
            is_reserved: false,
          },
          { helpText: field.description },
        ),
      );
    const fields = mergeFlagSpecs([], fieldFlags);
    const merged = mergeFlagSpecs(fields.flags, TOGGLES);
    return { flags: merged.flags, skipped: [...fields.skipped, ...merged.skipped] };
  }

  execute(values: ValueBag): MutationOutcome<C> {
    const declared = new Set(this.config.fields().map((field) => field.name));
    const changes: ChangeEntry[] = [];
    const rows: ReportCell[][] = [];

    for (const [option, value] of Object.entries(values)) {
      if (option === 'enable' || option === 'disable' || option === 'enabled') continue;
      if (option in this.defaults) continue;
      if (RESERVED_NAMES.has(option) || !declared.has(option)) continue;

      const current = this.config.get(option);
      if (value === undefined || isEmptyValue(value)) {
        rows.push([toOptionLabel(option), toCell(current)]);
        continue;
      }
      changes.push({
        kind: 'field',
        field: option,
        old_value: current === undefined || isEmptyValue(current) ? null : current,
        new_value: value,
      });
      this.config.set(option, value);
    }

    const enable = values['enable'] === true;
    const disable = values['disable'] === true;
    if (enable || disable) {
      const before = this.config.enabled;
      this.config.enabled = enable;
      changes.push({ kind: 'field', field: 'enabled', old_value: before, new_value: enable });
    }

    if (changes.length === 0) {
      rows.push(['enabled', this.config.enabled]);
      return { kind: 'report', report: { headers: TARGET_REPORT_HEADERS, rows } };
    }
    return { kind: 'mutated', target: this.config, changes };
  }
}
