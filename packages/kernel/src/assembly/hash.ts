/**
 * Rigging Kernel — Grammar Fingerprints
 *
 * Two grammars with equal content have equal hashes regardless of property
 * insertion order. Used to check that repeated derivation is idempotent and
 * to show a stable fingerprint in `rig describe`.
 */

import { createHash } from 'node:crypto';
import type { Grammar, GrammarHash } from '../types/flag.js';

/**
 * Canonical JSON: object keys sorted at every level, undefined as null.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${canonicalize(entry)}`);
    return '{' + pairs.join(',') + '}';
  }
  return 'null';
}

export function hashGrammar(grammar: Grammar): GrammarHash {
  const hex = createHash('sha256').update(canonicalize(grammar)).digest('hex');
  // Only this function mints GrammarHash values.
  return hex as GrammarHash;
}
