/**
 * Rigging Kernel — Interface Assembler
 *
 * Two interface shapes over one TargetDescriptor:
 *
 * - SingleResponsibilityInterface: construct, then call one fixed entry
 *   operation. Grammar = constructor flags + entry operation flags.
 * - MultipleResponsibilityInterface: construct, then call the operation
 *   named by a positional action. Zero-parameter operations become action
 *   tokens; the flags of every other whitelisted operation are merged in.
 *
 * Grammars are derived once, in the constructor, and never change. Flag
 * collisions follow the first-wins policy of mergeFlagSpecs.
 */

import { UnknownOperationError, UsageError } from '../errors.js';
import { extractTarget } from '../extraction/extractor.js';
import { mapParameter, toActionToken } from '../mapping/flag-mapper.js';
import type { ParameterDescriptor, ResolvedOperation, TargetDescriptor } from '../types/descriptor.js';
import type { FlagSpec, Grammar } from '../types/flag.js';
import type { TargetManifest } from '../types/manifest.js';
import type { ParamValue, ValueBag } from '../types/semantic.js';
import { mergeFlagSpecs } from './merge.js';

export type InterfaceKind = 'single' | 'multiple';

/** Parameter name → value that replaces the extraction-time default. */
export type InterfaceDefaults = Readonly<Record<string, ParamValue>>;

export interface InterfaceOptions {
  /** Command name the interface is registered and attached under. */
  readonly name: string;
  /** Falls back to the manifest description. */
  readonly description?: string | undefined;
  readonly defaults?: InterfaceDefaults | undefined;
}

export interface SingleResponsibilityOptions extends InterfaceOptions {
  /** The operation called after construction. */
  readonly entry: string;
}

export interface MultipleResponsibilityOptions extends InterfaceOptions {
  /** Operations exposed, in the order their action tokens are listed. */
  readonly operations: ReadonlyArray<string>;
  /** Whether the dispatcher hands the operation's result to its print callback. Default: true. */
  readonly print?: boolean | undefined;
}

function mapParameters(params: ReadonlyArray<ParameterDescriptor>, defaults: InterfaceDefaults): FlagSpec[] {
  return params
    .filter((param) => !param.is_reserved)
    .map((param) => mapParameter(param, { override: defaults[param.name] }));
}

/**
 * What the dispatcher and the CLI need from either interface shape.
 */
export interface ManagerInterface<T> {
  readonly kind: InterfaceKind;
  readonly name: string;
  readonly description: string;
  readonly descriptor: TargetDescriptor<T>;
  readonly defaults: InterfaceDefaults;
  /** Whether the dispatcher hands the operation's result to its print callback. */
  readonly print: boolean;
  /** Names of the constructor parameters; the dispatcher routes these to create(). */
  readonly baseDests: ReadonlySet<string>;
  grammar(): Grammar;
  /**
   * The operation a value bag selects.
   *
   * @throws {UsageError} If the action is missing or not an allowed choice
   */
  resolveOperation(values: ValueBag): ResolvedOperation<T>;
}

interface BaseParts<T> {
  readonly descriptor: TargetDescriptor<T>;
  readonly description: string;
  readonly defaults: InterfaceDefaults;
  readonly baseFlags: FlagSpec[];
  readonly baseDests: ReadonlySet<string>;
}

function deriveBase<T>(manifest: TargetManifest<T>, options: InterfaceOptions): BaseParts<T> {
  const descriptor = extractTarget(manifest);
  const defaults = options.defaults ?? {};
  return {
    descriptor,
    description: options.description ?? descriptor.description,
    defaults,
    baseFlags: mapParameters(descriptor.base.parameters, defaults),
    baseDests: new Set(
      descriptor.base.parameters.filter((param) => !param.is_reserved).map((param) => param.name),
    ),
  };
}

export class SingleResponsibilityInterface<T> implements ManagerInterface<T> {
  readonly kind = 'single';
  readonly name: string;
  readonly description: string;
  readonly descriptor: TargetDescriptor<T>;
  readonly defaults: InterfaceDefaults;
  readonly print = false;
  readonly baseDests: ReadonlySet<string>;
  readonly entry: ResolvedOperation<T>;
  private readonly _grammar: Grammar;

  /**
   * @throws {MissingTypeAnnotationError} If a constructor parameter is untyped
   * @throws {UnknownOperationError} If the entry operation does not exist
   */
  constructor(manifest: TargetManifest<T>, options: SingleResponsibilityOptions) {
    const base = deriveBase(manifest, options);
    this.name = options.name;
    this.description = base.description;
    this.descriptor = base.descriptor;
    this.defaults = base.defaults;
    this.baseDests = base.baseDests;

    const entry = this.descriptor.operations.get(options.entry);
    if (entry === undefined) {
      throw new UnknownOperationError(this.descriptor.target_id, options.entry);
    }
    this.entry = entry;
    const merged = mergeFlagSpecs(base.baseFlags, mapParameters(entry.parameters, this.defaults));
    this._grammar = { flags: merged.flags, skipped: merged.skipped };
  }

  grammar(): Grammar {
    return this._grammar;
  }

  resolveOperation(): ResolvedOperation<T> {
    return this.entry;
  }
}

export class MultipleResponsibilityInterface<T> implements ManagerInterface<T> {
  readonly kind = 'multiple';
  readonly name: string;
  readonly description: string;
  readonly descriptor: TargetDescriptor<T>;
  readonly defaults: InterfaceDefaults;
  readonly print: boolean;
  readonly baseDests: ReadonlySet<string>;
  private readonly _grammar: Grammar;
  private readonly _actions: ReadonlyMap<string, ResolvedOperation<T>>;

  /**
   * Whitelisted names the target does not expose are ignored.
   *
   * @throws {MissingTypeAnnotationError} If a constructor parameter is untyped
   */
  constructor(manifest: TargetManifest<T>, options: MultipleResponsibilityOptions) {
    const base = deriveBase(manifest, options);
    this.name = options.name;
    this.description = base.description;
    this.descriptor = base.descriptor;
    this.defaults = base.defaults;
    this.print = options.print ?? true;
    this.baseDests = base.baseDests;

    const actions = new Map<string, ResolvedOperation<T>>();
    let flags: FlagSpec[] = base.baseFlags;
    const skipped: FlagSpec[] = [];

    for (const name of options.operations) {
      const operation = this.descriptor.operations.get(name);
      if (operation === undefined) {
        continue;
      }
      if (operation.parameters.length === 0) {
        actions.set(toActionToken(name), operation);
        continue;
      }
      const merged = mergeFlagSpecs(flags, mapParameters(operation.parameters, this.defaults));
      flags = merged.flags;
      skipped.push(...merged.skipped);
    }

    this._actions = actions;
    this._grammar =
      actions.size > 0
        ? {
            flags,
            skipped,
            action: { dest: 'action', choices: [...actions.keys()], help_text: 'The action to perform' },
          }
        : { flags, skipped };
  }

  grammar(): Grammar {
    return this._grammar;
  }

  /** Allowed action tokens, in whitelist order. */
  actions(): string[] {
    return [...this._actions.keys()];
  }

  resolveOperation(values: ValueBag): ResolvedOperation<T> {
    const action = values['action'];
    if (typeof action !== 'string' || action === '') {
      throw new UsageError(`${this.name}: an action is required (choose from ${this.quoteChoices()})`);
    }
    const operation = this._actions.get(action);
    if (operation === undefined) {
      throw new UsageError(
        `${this.name}: invalid action '${action}' (choose from ${this.quoteChoices()})`,
      );
    }
    return operation;
  }

  private quoteChoices(): string {
    return this.actions()
      .map((choice) => `'${choice}'`)
      .join(', ');
  }
}
