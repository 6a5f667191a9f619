/**
 * Rigging Runtime Host — File-backed Change Sink
 *
 * Implements the ChangeSink interface from @rigging/kernel by appending one
 * JSONL line per mutation pass to `logs/changes.jsonl` of the injected
 * StateIO. The write completes before append() returns.
 */

import type { ChangeRecord, ChangeSink } from '@rigging/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const CHANGE_LOG_FILE = 'changes.jsonl';

export class FileChangeSink implements ChangeSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = () => ulid(),
  ) {}

  append(record: ChangeRecord): void {
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: record.timestamp,
      interface_name: record.interface_name,
      changes: record.changes,
    });
    this.stateIO.appendLine(CHANGE_LOG_FILE, line);
  }
}
