/**
 * Rigging Runtime Host — Change Log Reader
 *
 * Pure function over the raw text of `changes.jsonl`:
 *
 *   - malformed lines (bad JSON, missing fields) are dropped and counted
 *   - events are deduplicated by event_id, first seen wins
 *   - content not ending in '\n' has its last (partial) line dropped
 *   - output is sorted by timestamp, then event_id
 *
 * Callers obtain the raw content via StateIO.readLogRaw().
 */

import type { ChangeEntry } from '@rigging/kernel';

export interface ChangeLogEvent {
  readonly event_id: string;
  readonly timestamp: string;
  readonly interface_name: string;
  readonly changes: ReadonlyArray<ChangeEntry>;
}

export interface ChangeLogStats {
  /** Non-empty lines processed, partial trailing line excluded. */
  totalLines: number;
  /** Events kept after deduplication. */
  parsedEvents: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
}

export interface ChangeLogReadResult {
  readonly events: ReadonlyArray<ChangeLogEvent>;
  readonly stats: ChangeLogStats;
}

// ---------------------------------------------------------------------------
// Shape checks
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isParamValue(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.every((item) => typeof item === 'string' || typeof item === 'number');
  }
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isAnalyzerState(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value['enabled'] === 'boolean' &&
    (value['value'] === null || typeof value['value'] === 'string')
  );
}

function isChangeEntry(value: unknown): value is ChangeEntry {
  if (!isRecord(value)) return false;
  switch (value['kind']) {
    case 'analyzer':
      return (
        typeof value['id'] === 'number' &&
        typeof value['name'] === 'string' &&
        isAnalyzerState(value['before']) &&
        isAnalyzerState(value['after'])
      );
    case 'field':
      return (
        typeof value['field'] === 'string' &&
        (value['old_value'] === null || isParamValue(value['old_value'])) &&
        isParamValue(value['new_value'])
      );
    default:
      return false;
  }
}

function toEvent(value: unknown): ChangeLogEvent | null {
  if (!isRecord(value)) return null;
  const { event_id, timestamp, interface_name, changes } = value;
  if (
    typeof event_id !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof interface_name !== 'string' ||
    !Array.isArray(changes)
  ) {
    return null;
  }
  const entries: ChangeEntry[] = [];
  for (const change of changes) {
    if (!isChangeEntry(change)) return null;
    entries.push(change);
  }
  return { event_id, timestamp, interface_name, changes: entries };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readChangeLog(rawContent: string): ChangeLogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  const seen = new Set<string>();
  const events: ChangeLogEvent[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }
    const event = toEvent(parsed);
    if (event === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  events.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
