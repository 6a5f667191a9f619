/**
 * Rigging Kernel — Flag Merge Policy
 *
 * First wins. A FlagSpec whose dest or any of whose switches is already
 * taken is dropped and reported in `skipped`, in encounter order.
 */

import type { FlagSpec } from '../types/flag.js';

export interface MergeResult {
  readonly flags: FlagSpec[];
  readonly skipped: FlagSpec[];
}

/**
 * Merge `incoming` into `accepted`. Neither input is modified.
 */
export function mergeFlagSpecs(
  accepted: ReadonlyArray<FlagSpec>,
  incoming: ReadonlyArray<FlagSpec>,
): MergeResult {
  const flags = [...accepted];
  const skipped: FlagSpec[] = [];
  const dests = new Set(accepted.map((spec) => spec.dest));
  const switches = new Set(accepted.flatMap((spec) => spec.flags));

  for (const spec of incoming) {
    if (dests.has(spec.dest) || spec.flags.some((flag) => switches.has(flag))) {
      skipped.push(spec);
      continue;
    }
    flags.push(spec);
    dests.add(spec.dest);
    for (const flag of spec.flags) {
      switches.add(flag);
    }
  }

  return { flags, skipped };
}
