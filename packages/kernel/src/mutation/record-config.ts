/**
 * Rigging Kernel — Record-backed Target Configuration
 *
 * A TargetConfigObject over a fixed field list and a plain value record.
 * Writes are type-checked against the declared field type.
 */

import type { ConfigField, TargetConfigObject } from '../types/change.js';
import type { ParamValue } from '../types/semantic.js';
import { formatType, valueMatchesType } from '../types/semantic.js';

export type ConfigValues = Readonly<Record<string, ParamValue | undefined>>;

export class RecordConfigObject implements TargetConfigObject {
  enabled: boolean;
  private readonly declared: ReadonlyMap<string, ConfigField>;
  private readonly values = new Map<string, ParamValue>();

  constructor(fields: ReadonlyArray<ConfigField>, initial: ConfigValues = {}, enabled = false) {
    this.declared = new Map(fields.map((field) => [field.name, field]));
    this.enabled = enabled;
    for (const [name, value] of Object.entries(initial)) {
      if (value !== undefined) {
        this.set(name, value);
      }
    }
  }

  fields(): ReadonlyArray<ConfigField> {
    return [...this.declared.values()];
  }

  get(name: string): ParamValue | undefined {
    this.fieldOf(name);
    return this.values.get(name);
  }

  set(name: string, value: ParamValue): void {
    const field = this.fieldOf(name);
    if (!valueMatchesType(field.type, value)) {
      throw new TypeError(`Field "${name}" expects ${formatType(field.type)}, got ${JSON.stringify(value)}`);
    }
    this.values.set(name, value);
  }

  /** Current values in field order; unset fields are omitted. */
  toRecord(): Record<string, ParamValue> {
    const record: Record<string, ParamValue> = {};
    for (const name of this.declared.keys()) {
      const value = this.values.get(name);
      if (value !== undefined) {
        record[name] = value;
      }
    }
    return record;
  }

  private fieldOf(name: string): ConfigField {
    const field = this.declared.get(name);
    if (field === undefined) {
      throw new RangeError(`Unknown config field "${name}"`);
    }
    return field;
  }
}
