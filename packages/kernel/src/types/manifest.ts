/**
 * Rigging Kernel — Target Manifests
 *
 * A target manifest is the static, declarative description of a manager
 * type: its constructor parameters, its operations, and the operation layers
 * it inherits from. Grammars are derived from manifests, never from runtime
 * reflection.
 *
 * Override semantics are expressed through `extends` links between layers.
 * A layer's own operations shadow same-named operations further down the
 * chain; the extractor pre-merges the chain into one flat operation map.
 */

import type { ParamValue, SemanticType, ValueBag } from './semantic.js';

/**
 * One declared parameter of a constructor or operation.
 *
 * `type` is optional at the type level so that manifests assembled from
 * untyped sources can be represented; a constructor parameter without a type
 * is rejected at extraction time (MissingTypeAnnotationError).
 */
export interface ParameterManifest {
  readonly name: string;
  readonly type?: SemanticType | undefined;
  /** Extraction-time default. A non-empty default makes the flag optional. */
  readonly default?: ParamValue | undefined;
  /** Operator-facing help text. */
  readonly description?: string | undefined;
}

/**
 * One operation a target exposes.
 *
 * `run` receives the constructed target and the operation's share of the
 * parsed value bag. Its return value is surfaced to the caller.
 */
export interface OperationManifest<T> {
  readonly name: string;
  readonly params: ReadonlyArray<ParameterManifest>;
  readonly description?: string | undefined;
  run(target: T, args: ValueBag): unknown;
}

/**
 * A named group of operations, optionally layered over a parent group.
 *
 * A layer typed for a base class can be extended by a manifest typed for a
 * subclass: operations on the base accept the subclass instance.
 */
export interface OperationLayer<T> {
  readonly layer_id: string;
  readonly operations: ReadonlyArray<OperationManifest<T>>;
  readonly extends?: OperationLayer<T> | undefined;
}

/**
 * The full manifest of a manager target.
 *
 * @example
 * const manifest: TargetManifest<Counter> = {
 *   layer_id: 'counter',
 *   description: 'A counter',
 *   constructor_params: [{ name: 'start', type: ParamType.Integer }],
 *   create: (args) => new Counter(Number(args['start'])),
 *   operations: [{ name: 'increment', params: [], run: (c) => c.increment() }],
 * };
 */
export interface TargetManifest<T> extends OperationLayer<T> {
  /** Used as the interface description when none is given. */
  readonly description: string;
  readonly constructor_params: ReadonlyArray<ParameterManifest>;
  create(args: ValueBag): T;
}
