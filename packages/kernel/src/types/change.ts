/**
 * Rigging Kernel — Configuration Objects, Change Sets, and Reports
 *
 * Configuration objects are mutated in place by the mutation engine.
 * Every mutation pass yields exactly one of two outcomes:
 *
 *   - a read-only Report (nothing selected, nothing non-empty), or
 *   - the mutated object plus the ChangeSet describing what was applied.
 *
 * There is no partial-mutation-then-report outcome.
 */

import type { ParamValue, SemanticType } from './semantic.js';

// ---------------------------------------------------------------------------
// Analyzer Collections
// ---------------------------------------------------------------------------

/** One addressable sub-item of a configuration object (a script, a rule set). */
export interface Analyzer {
  readonly id: number;
  readonly name: string;
  enabled: boolean;
  value?: string | undefined;
}

/**
 * A configuration object that owns an ordered analyzer list.
 * Items are toggled in place; they are never reordered or removed.
 */
export interface AnalyzerCollection {
  readonly analyzers: ReadonlyArray<Analyzer>;
}

// ---------------------------------------------------------------------------
// Target Configuration Objects
// ---------------------------------------------------------------------------

/** One declared field of a target configuration object. */
export interface ConfigField {
  readonly name: string;
  readonly type: SemanticType;
  readonly description: string;
}

/**
 * A downstream target configuration ("where do events get sent").
 *
 * Mutation and diffing operate over the closed set returned by fields();
 * get/set with any other name is a programming error and implementations
 * may throw.
 */
export interface TargetConfigObject {
  fields(): ReadonlyArray<ConfigField>;
  get(name: string): ParamValue | undefined;
  set(name: string, value: ParamValue): void;
  enabled: boolean;
}

// ---------------------------------------------------------------------------
// Change Sets
// ---------------------------------------------------------------------------

export interface AnalyzerState {
  readonly enabled: boolean;
  readonly value: string | null;
}

export type ChangeEntry =
  | {
      readonly kind: 'analyzer';
      readonly id: number;
      readonly name: string;
      readonly before: AnalyzerState;
      readonly after: AnalyzerState;
    }
  | {
      readonly kind: 'field';
      readonly field: string;
      readonly old_value: ParamValue | null;
      readonly new_value: ParamValue;
    };

export type ChangeSet = ReadonlyArray<ChangeEntry>;

// ---------------------------------------------------------------------------
// Reports and Outcomes
// ---------------------------------------------------------------------------

export type ReportCell = string | number | boolean;

/** A tabulated, read-only view. Rendering is the caller's concern. */
export interface Report {
  readonly headers: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<ReadonlyArray<ReportCell>>;
}

export type MutationOutcome<C> =
  | { readonly kind: 'report'; readonly report: Report }
  | { readonly kind: 'mutated'; readonly target: C; readonly changes: ChangeSet };

/** Placeholder shown for unset values in reports. */
export const NOT_AVAILABLE = 'N/A';
