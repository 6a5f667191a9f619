/**
 * Rigging Kernel — Flag Specifications and Grammars
 *
 * A FlagSpec is the command-line projection of one ParameterDescriptor.
 * A Grammar is the ordered set of FlagSpecs (plus an optional positional
 * action selector) that one interface accepts.
 *
 * Grammars are plain data. The CLI projects them onto a concrete argument
 * parser; the kernel uses them to normalize and validate value bags.
 */

import type { ParamValue } from './semantic.js';

/** Coercion applied to each raw value. `none` marks a zero-argument toggle. */
export type FlagValueType = 'string' | 'int' | 'float' | 'none';

export type Multiplicity = 'single' | 'many';

export interface FlagSpec {
  /** The parameter name the parsed value is stored under. */
  readonly dest: string;
  /** Switches, primary first (e.g. ['--node-name']). */
  readonly flags: ReadonlyArray<string>;
  readonly required: boolean;
  readonly value_type: FlagValueType;
  readonly multiplicity: Multiplicity;
  readonly help_text: string;
  readonly default?: ParamValue | undefined;
}

/** The positional selector of a multiple-responsibility grammar. */
export interface ActionSpec {
  readonly dest: 'action';
  /** Allowed tokens, hyphenated, in whitelist order. */
  readonly choices: ReadonlyArray<string>;
  readonly help_text: string;
}

export interface Grammar {
  readonly flags: ReadonlyArray<FlagSpec>;
  readonly action?: ActionSpec | undefined;
  /** FlagSpecs dropped by the first-wins merge policy, in encounter order. */
  readonly skipped: ReadonlyArray<FlagSpec>;
}

/**
 * Opaque brand for grammar fingerprints.
 */
declare const __grammarHashBrand: unique symbol;

/** SHA-256 over the canonical JSON form of a Grammar. */
export type GrammarHash = string & {
  readonly [__grammarHashBrand]: 'GrammarHash';
};
