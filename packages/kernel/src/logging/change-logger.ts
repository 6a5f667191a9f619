/**
 * Rigging Kernel — Change Logger
 *
 * Records one ChangeRecord per mutation pass. Report outcomes change
 * nothing and are not recorded.
 *
 * If no sink is injected (e.g., in tests), record() is a no-op.
 */

import type { ChangeSet, MutationOutcome } from '../types/change.js';
import type { ChangeRecord, ChangeSink } from './change-sink.js';

export class ChangeLogger {
  constructor(
    private readonly sink?: ChangeSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Record a pass and return the record that was forwarded to the sink.
   */
  record(interfaceName: string, changes: ChangeSet): ChangeRecord {
    const record: ChangeRecord = {
      interface_name: interfaceName,
      timestamp: this.clock().toISOString(),
      changes,
    };
    this.sink?.append(record);
    return record;
  }

  /**
   * Record the outcome of one execute() call, if it mutated anything.
   *
   * @returns The record, or null for report outcomes
   */
  recordOutcome<C>(interfaceName: string, outcome: MutationOutcome<C>): ChangeRecord | null {
    if (outcome.kind === 'report') {
      return null;
    }
    return this.record(interfaceName, outcome.changes);
  }
}
