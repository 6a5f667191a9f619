/**
 * Rigging Kernel — Configuration Interfaces
 *
 * A configuration interface owns one live configuration object. Its grammar
 * is derived from the object's current shape; execute() applies one parsed
 * value bag and returns either a Report or the mutated object with its
 * ChangeSet.
 */

import type { MutationOutcome } from '../types/change.js';
import type { Grammar } from '../types/flag.js';
import type { ValueBag } from '../types/semantic.js';

export interface ConfigInterface<C> {
  readonly name: string;
  readonly description: string;
  readonly config: C;
  grammar(): Grammar;
  execute(values: ValueBag): MutationOutcome<C>;
}

export interface ConfigInterfaceOptions {
  readonly name: string;
  readonly description?: string | undefined;
}

/** `max_batch_size` → `max-batch-size`, the form options appear in reports. */
export function toOptionLabel(field: string): string {
  return field.replace(/_/g, '-');
}
