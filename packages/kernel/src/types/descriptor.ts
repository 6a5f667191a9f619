/**
 * Rigging Kernel — Descriptors
 *
 * Descriptors are the extracted, validated form of a target manifest.
 * Every parameter carries a semantic type; reserved names are marked so
 * that no stage downstream of extraction has to re-check them.
 */

import type { ParamValue, SemanticType, ValueBag } from './semantic.js';

/**
 * Names used internally for dispatch control. Parameters with these names
 * never become flags, and values under these keys never reach a target.
 */
export const RESERVED_NAMES: ReadonlySet<string> = new Set(['action', 'sub_interface']);

export interface ParameterDescriptor {
  readonly name: string;
  readonly semantic_type: SemanticType;
  readonly default?: ParamValue | undefined;
  readonly description: string;
  readonly is_reserved: boolean;
}

export interface OperationDescriptor {
  readonly name: string;
  readonly parameters: ReadonlyArray<ParameterDescriptor>;
}

/** An operation descriptor bound to its implementation. */
export interface ResolvedOperation<T> extends OperationDescriptor {
  /** The layer that defined the winning signature. */
  readonly layer_id: string;
  run(target: T, args: ValueBag): unknown;
}

export interface TargetDescriptor<T> {
  readonly target_id: string;
  readonly description: string;
  /** The constructor's parameters ("base parameters"). */
  readonly base: OperationDescriptor;
  /** Operation name → winning definition, in first-seen order. */
  readonly operations: ReadonlyMap<string, ResolvedOperation<T>>;
  /** Operation names skipped because a parameter had no type. */
  readonly skipped_operations: ReadonlyArray<string>;
  create(args: ValueBag): T;
}
