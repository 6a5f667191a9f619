/**
 * Rigging Kernel — Parameter-to-Flag Mapper
 *
 * Converts one ParameterDescriptor into one FlagSpec.
 *
 * Type precedence:
 *   1. boolean (or optional<boolean>) → zero-argument toggle
 *   2. list<T>                         → one-or-more values of T
 *   3. optional<T> or non-empty default → optional single value
 *   4. otherwise                       → required single value
 *
 * An external override (e.g. a fixed install path supplied by the interface
 * builder) replaces the extraction-time default and forces required = false.
 * Empty overrides are ignored, so `{ stdout: false }` leaves a parameter as
 * extracted.
 *
 * The mapping is referentially transparent: the same descriptor and options
 * always yield an equal FlagSpec.
 */

import { UsageError } from '../errors.js';
import type { ParameterDescriptor } from '../types/descriptor.js';
import type { FlagSpec, FlagValueType } from '../types/flag.js';
import type { ParamValue, ScalarKind } from '../types/semantic.js';
import { isEmptyValue, unwrapOptional } from '../types/semantic.js';

export interface MapOptions {
  /** Caller-supplied default. Non-empty values win over the descriptor's default. */
  readonly override?: ParamValue | undefined;
  /** Pre-resolved help text. Falls back to the descriptor's description. */
  readonly helpText?: string | undefined;
}

const VALUE_TYPES: Readonly<Record<ScalarKind, FlagValueType>> = {
  string: 'string',
  integer: 'int',
  float: 'float',
};

/** `node_name` → `--node-name` */
export function toFlagName(name: string): string {
  return '--' + name.replace(/_/g, '-');
}

/** `start_all` → `start-all`; the form action tokens take. */
export function toActionToken(operationName: string): string {
  return operationName.replace(/_/g, '-');
}

/** `start-all` → `start_all` */
export function fromActionToken(token: string): string {
  return token.replace(/-/g, '_');
}

function normalizeHelp(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}

/**
 * Map one parameter to its FlagSpec.
 */
export function mapParameter(param: ParameterDescriptor, options: MapOptions = {}): FlagSpec {
  const overridden = !isEmptyValue(options.override);
  const effectiveDefault = overridden ? options.override : param.default;
  const optional = param.semantic_type.kind === 'optional' || !isEmptyValue(effectiveDefault);
  const inner = unwrapOptional(param.semantic_type);

  const base = {
    dest: param.name,
    flags: [toFlagName(param.name)],
    help_text: normalizeHelp(options.helpText ?? param.description),
    ...(effectiveDefault !== undefined && effectiveDefault !== '' ? { default: effectiveDefault } : {}),
  };

  switch (inner.kind) {
    case 'boolean':
      return { ...base, required: false, value_type: 'none', multiplicity: 'single' };
    case 'list':
      return { ...base, required: !optional, value_type: VALUE_TYPES[inner.of.kind], multiplicity: 'many' };
    default:
      return { ...base, required: !optional, value_type: VALUE_TYPES[inner.kind], multiplicity: 'single' };
  }
}

/**
 * One-line JSON description of a FlagSpec. Keys appear in a fixed order;
 * help_text and default are omitted when absent.
 */
export function describeFlagSpec(spec: FlagSpec): string {
  return JSON.stringify({
    dest: spec.dest,
    flags: spec.flags,
    required: spec.required,
    value_type: spec.value_type,
    multiplicity: spec.multiplicity,
    ...(spec.help_text !== '' ? { help_text: spec.help_text } : {}),
    ...(spec.default !== undefined ? { default: spec.default } : {}),
  });
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Coerce one raw argument to the flag's value type.
 *
 * @throws {UsageError} If the raw text is not a valid float, or not an int within the safe integer range
 */
export function coerceValue(spec: FlagSpec, raw: string): string | number {
  const flag = spec.flags[0] ?? spec.dest;
  switch (spec.value_type) {
    case 'int': {
      const text = raw.trim();
      if (!INTEGER_PATTERN.test(text)) {
        throw new UsageError(`${flag}: invalid int value: '${raw}'`);
      }
      const value = Number.parseInt(text, 10);
      if (!Number.isSafeInteger(value)) {
        throw new UsageError(`${flag}: invalid int value: '${raw}'`);
      }
      return value;
    }
    case 'float': {
      const value = raw.trim() === '' ? Number.NaN : Number(raw);
      if (!Number.isFinite(value)) {
        throw new UsageError(`${flag}: invalid float value: '${raw}'`);
      }
      return value;
    }
    case 'string':
      return raw;
    case 'none':
      throw new UsageError(`${flag}: takes no value`);
  }
}
