/**
 * Rigging Kernel — Change Sink Interface
 *
 * The injection point for change log persistence. Concrete sinks live in
 * the runtime host; the kernel never writes to disk.
 */

import type { ChangeSet } from '../types/change.js';

/** One applied mutation pass. */
export interface ChangeRecord {
  /** Name of the configuration interface that applied the pass. */
  readonly interface_name: string;
  /** ISO 8601. */
  readonly timestamp: string;
  readonly changes: ChangeSet;
}

/**
 * Receives change records. Implementations must not silently discard
 * entries.
 */
export interface ChangeSink {
  append(record: ChangeRecord): void;
}
