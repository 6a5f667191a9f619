/**
 * Rigging First-Party Sensor Module — Sensor Scripts
 *
 * The analysis scripts the sensor can load, as an analyzer collection.
 * The script list ships in data/scripts.json; which scripts are enabled is
 * persisted per home by the ConfigObjectStore.
 */

import { readFileSync } from 'node:fs';
import type { Analyzer, AnalyzerCollection } from '@rigging/kernel';
import type { ConfigObjectStore } from '@rigging/target-loader';

export const SCRIPTS_FILE = 'sensor-scripts.json';

const SEED_URL = new URL('../data/scripts.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAnalyzer(value: unknown): Analyzer | null {
  if (!isRecord(value)) return null;
  const { id, name, enabled, value: scriptValue } = value;
  if (typeof id !== 'number' || typeof name !== 'string' || typeof enabled !== 'boolean') return null;
  return typeof scriptValue === 'string' ? { id, name, enabled, value: scriptValue } : { id, name, enabled };
}

/**
 * Parse a script list. Entries that are not `{ id, name, enabled }` are dropped.
 *
 * @throws {SyntaxError} If the content is not JSON
 */
export function parseScriptSeed(content: string): Analyzer[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    return [];
  }
  const analyzers: Analyzer[] = [];
  for (const item of parsed) {
    const analyzer = toAnalyzer(item);
    if (analyzer !== null) {
      analyzers.push(analyzer);
    }
  }
  return analyzers;
}

let seed: ReadonlyArray<Analyzer> | undefined;

/** The shipped script list, read once. */
export function scriptSeed(): ReadonlyArray<Analyzer> {
  if (seed === undefined) {
    seed = parseScriptSeed(readFileSync(SEED_URL, 'utf-8'));
  }
  return seed;
}

export class SensorScripts implements AnalyzerCollection {
  constructor(readonly analyzers: ReadonlyArray<Analyzer>) {}

  static load(store: ConfigObjectStore, base: ReadonlyArray<Analyzer> = scriptSeed()): SensorScripts {
    return new SensorScripts(store.loadAnalyzers(SCRIPTS_FILE, base));
  }

  save(store: ConfigObjectStore): void {
    store.saveAnalyzers(SCRIPTS_FILE, this);
  }
}
