/**
 * Rigging Kernel — Semantic Types
 *
 * The closed set of parameter types a target manifest may declare.
 *
 * Nesting is constrained by construction:
 * - list<T> only wraps a scalar (string, integer, float)
 * - optional<T> wraps any non-optional type
 *
 * There is no list of booleans and no optional of optional. Manifests that
 * arrive untyped (JavaScript callers, JSON) are checked against the same
 * shape by isSemanticType().
 */

// ---------------------------------------------------------------------------
// Type Nodes
// ---------------------------------------------------------------------------

export type ScalarKind = 'string' | 'integer' | 'float';

export interface ScalarType {
  readonly kind: ScalarKind;
}

export interface BooleanType {
  readonly kind: 'boolean';
}

export interface ListType {
  readonly kind: 'list';
  readonly of: ScalarType;
}

export interface OptionalType {
  readonly kind: 'optional';
  readonly of: ScalarType | BooleanType | ListType;
}

export type SemanticType = ScalarType | BooleanType | ListType | OptionalType;

/** Any semantic type other than optional<T>. */
export type RequiredType = OptionalType['of'];

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

const STRING: ScalarType = { kind: 'string' };
const INTEGER: ScalarType = { kind: 'integer' };
const FLOAT: ScalarType = { kind: 'float' };
const BOOLEAN: BooleanType = { kind: 'boolean' };

/**
 * Type constants and constructors used by target manifests.
 *
 * @example
 * { name: 'port', type: ParamType.optional(ParamType.Integer) }
 * { name: 'interfaces', type: ParamType.list(ParamType.String) }
 */
export const ParamType = {
  String: STRING,
  Integer: INTEGER,
  Float: FLOAT,
  Boolean: BOOLEAN,
  list(of: ScalarType): ListType {
    return { kind: 'list', of };
  },
  optional(of: RequiredType): OptionalType {
    return { kind: 'optional', of };
  },
} as const;

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A single parsed value, after coercion. */
export type ScalarValue = string | number | boolean;

/** Any value a parameter, flag default, or config field may hold. */
export type ParamValue = ScalarValue | ReadonlyArray<string | number>;

/**
 * Parsed operator input keyed by parameter name (the flag's dest).
 * Absent optional values are undefined.
 */
export type ValueBag = Readonly<Record<string, ParamValue | undefined>>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Narrow a value to its list form. */
export function isListValue(value: ParamValue): value is ReadonlyArray<string | number> {
  return Array.isArray(value);
}

/** Strip one optional<> wrapper, if present. */
export function unwrapOptional(type: SemanticType): RequiredType {
  return type.kind === 'optional' ? type.of : type;
}

/** Render a type as `optional<list<integer>>` for messages and descriptions. */
export function formatType(type: SemanticType): string {
  switch (type.kind) {
    case 'optional':
      return `optional<${formatType(type.of)}>`;
    case 'list':
      return `list<${type.of.kind}>`;
    default:
      return type.kind;
  }
}

const SCALAR_KINDS: ReadonlySet<string> = new Set(['string', 'integer', 'float']);

function hasKind(value: unknown): value is { readonly kind: unknown; readonly of?: unknown } {
  return typeof value === 'object' && value !== null && 'kind' in value;
}

function isScalarType(value: unknown): value is ScalarType {
  return hasKind(value) && typeof value.kind === 'string' && SCALAR_KINDS.has(value.kind);
}

function isRequiredType(value: unknown): value is RequiredType {
  if (!hasKind(value)) return false;
  if (value.kind === 'boolean') return true;
  if (value.kind === 'list') return isScalarType(value.of);
  return isScalarType(value);
}

/**
 * Narrow an unknown value to a well-formed SemanticType.
 * Used by the target validator for manifests that did not pass the compiler.
 */
export function isSemanticType(value: unknown): value is SemanticType {
  if (!hasKind(value)) return false;
  if (value.kind === 'optional') return isRequiredType(value.of);
  return isRequiredType(value);
}

/**
 * Truthiness test used throughout the pipeline.
 *
 * Empty means: undefined, null, '', false, 0, NaN, or an empty list.
 * External defaults that are empty are ignored by the mapper, and empty
 * values in a config value bag are reported rather than applied.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (value === '' || value === false || value === 0) return true;
  if (typeof value === 'number' && Number.isNaN(value)) return true;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/** Whether a value is shaped the way a value of `type` must be. */
export function valueMatchesType(type: SemanticType, value: ParamValue): boolean {
  const inner = unwrapOptional(type);
  switch (inner.kind) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'list':
      return isListValue(value) && value.every((v) => scalarMatches(inner.of.kind, v));
    default:
      return !isListValue(value) && scalarMatches(inner.kind, value);
  }
}

function scalarMatches(kind: ScalarKind, value: ScalarValue): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
  }
}
