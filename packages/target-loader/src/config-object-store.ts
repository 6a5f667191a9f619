/**
 * Rigging Target Loader — Configuration Object Store
 *
 * StateIO-backed persistence for the two kinds of configuration object.
 *
 * Analyzer collections are stored as `{ analyzers: [{ id, enabled, value }] }`
 * and overlaid on a seed list when loaded: the seed decides which analyzers
 * exist and their names, the file only their state. Target configuration
 * objects are stored as `{ enabled, values }`.
 *
 * Persisted content is validated on read. Entries that do not have the
 * expected shape are ignored and the seed or default applies.
 */

import { RecordConfigObject, valueMatchesType } from '@rigging/kernel';
import type {
  Analyzer,
  AnalyzerCollection,
  ConfigField,
  ConfigValues,
  ParamValue,
} from '@rigging/kernel';
import type { StateIO } from '@rigging/runtime-host';

export interface PersistedAnalyzer {
  readonly id: number;
  readonly enabled: boolean;
  readonly value: string | null;
}

export interface PersistedTarget {
  readonly enabled: boolean;
  readonly values: Readonly<Record<string, ParamValue>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isParamValue(value: unknown): value is ParamValue {
  if (Array.isArray(value)) {
    return value.every((item) => typeof item === 'string' || typeof item === 'number');
  }
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function persistedAnalyzers(raw: unknown): Map<number, PersistedAnalyzer> {
  const byId = new Map<number, PersistedAnalyzer>();
  if (!isRecord(raw) || !Array.isArray(raw['analyzers'])) {
    return byId;
  }
  for (const item of raw['analyzers']) {
    if (!isRecord(item)) continue;
    const { id, enabled, value } = item;
    if (typeof id !== 'number' || typeof enabled !== 'boolean') continue;
    if (value !== null && typeof value !== 'string') continue;
    byId.set(id, { id, enabled, value });
  }
  return byId;
}

export class ConfigObjectStore {
  constructor(private readonly stateIO: StateIO) {}

  /**
   * Fresh copies of the seed analyzers with persisted state applied.
   * Persisted ids absent from the seed are dropped.
   */
  loadAnalyzers(filename: string, seed: ReadonlyArray<Analyzer>): Analyzer[] {
    const persisted = persistedAnalyzers(this.stateIO.readJson<unknown>(filename, null));
    return seed.map((analyzer) => {
      const saved = persisted.get(analyzer.id);
      if (saved === undefined) {
        return { ...analyzer };
      }
      return {
        id: analyzer.id,
        name: analyzer.name,
        enabled: saved.enabled,
        value: saved.value ?? undefined,
      };
    });
  }

  saveAnalyzers(filename: string, collection: AnalyzerCollection): void {
    const analyzers: PersistedAnalyzer[] = collection.analyzers.map((analyzer) => ({
      id: analyzer.id,
      enabled: analyzer.enabled,
      value: analyzer.value !== undefined && analyzer.value !== '' ? analyzer.value : null,
    }));
    this.stateIO.writeJson(filename, { analyzers });
  }

  /**
   * Build a RecordConfigObject from `defaults` overlaid with persisted
   * values. A persisted value whose type no longer matches its field is
   * ignored.
   */
  loadTarget(filename: string, fields: ReadonlyArray<ConfigField>, defaults: ConfigValues = {}): RecordConfigObject {
    const raw = this.stateIO.readJson<unknown>(filename, null);
    const config = new RecordConfigObject(fields, defaults);
    if (!isRecord(raw)) {
      return config;
    }
    if (typeof raw['enabled'] === 'boolean') {
      config.enabled = raw['enabled'];
    }
    const values = raw['values'];
    if (isRecord(values)) {
      for (const field of fields) {
        const value = values[field.name];
        if (isParamValue(value) && valueMatchesType(field.type, value)) {
          config.set(field.name, value);
        }
      }
    }
    return config;
  }

  saveTarget(filename: string, config: RecordConfigObject): void {
    const persisted: PersistedTarget = { enabled: config.enabled, values: config.toRecord() };
    this.stateIO.writeJson(filename, persisted);
  }
}
