/**
 * Rigging Kernel — Execution Dispatcher
 *
 * Routes a parsed value bag to a target:
 *
 *   1. normalize: fill defaults, reject missing required flags
 *   2. resolve the operation (fixed, or selected by the action token)
 *   3. partition: constructor args vs operation args
 *   4. construct, invoke, await
 *
 * Steps 1–3 throw UsageError before anything is constructed. Errors raised
 * by the target's constructor or operation propagate unchanged.
 */

import type { ManagerInterface } from '../assembly/interfaces.js';
import { UsageError } from '../errors.js';
import { RESERVED_NAMES } from '../types/descriptor.js';
import type { Grammar } from '../types/flag.js';
import type { ParamValue, ValueBag } from '../types/semantic.js';
import { isEmptyValue } from '../types/semantic.js';

export interface PartitionedValues {
  readonly constructorArgs: Record<string, ParamValue | undefined>;
  readonly operationArgs: Record<string, ParamValue | undefined>;
}

export interface DispatchOptions {
  /** Receives the operation result when the interface prints. */
  readonly print?: ((result: unknown) => void) | undefined;
}

/**
 * Apply the grammar's defaults and check required flags.
 *
 * Absent toggles become their default, or false. An empty list counts as
 * absent. Keys the grammar does not declare are kept as-is.
 *
 * @throws {UsageError} If a required flag is absent or empty
 */
export function normalizeValues(grammar: Grammar, values: ValueBag): Record<string, ParamValue | undefined> {
  const normalized: Record<string, ParamValue | undefined> = { ...values };
  const missing: string[] = [];

  for (const spec of grammar.flags) {
    const value = normalized[spec.dest];
    const absent = value === undefined || (spec.multiplicity === 'many' && isEmptyValue(value));
    if (!absent) {
      continue;
    }
    if (spec.default !== undefined) {
      normalized[spec.dest] = spec.default;
    } else if (spec.value_type === 'none') {
      normalized[spec.dest] = false;
    } else if (spec.required) {
      missing.push(spec.flags[0] ?? spec.dest);
    }
  }

  if (missing.length > 0) {
    throw new UsageError(`the following arguments are required: ${missing.join(', ')}`);
  }
  return normalized;
}

/**
 * Split a value bag into constructor and operation arguments.
 * Reserved keys go to neither.
 */
export function partitionValues(baseDests: ReadonlySet<string>, values: ValueBag): PartitionedValues {
  const constructorArgs: Record<string, ParamValue | undefined> = {};
  const operationArgs: Record<string, ParamValue | undefined> = {};
  for (const [key, value] of Object.entries(values)) {
    if (baseDests.has(key)) {
      constructorArgs[key] = value;
    } else if (!RESERVED_NAMES.has(key)) {
      operationArgs[key] = value;
    }
  }
  return { constructorArgs, operationArgs };
}

/**
 * Construct the target and invoke the selected operation.
 *
 * @returns The operation's (awaited) result
 * @throws {UsageError} If the values do not satisfy the interface's grammar
 */
export async function dispatch<T>(
  iface: ManagerInterface<T>,
  values: ValueBag,
  options: DispatchOptions = {},
): Promise<unknown> {
  const normalized = normalizeValues(iface.grammar(), values);
  const operation = iface.resolveOperation(normalized);
  const { constructorArgs, operationArgs } = partitionValues(iface.baseDests, normalized);

  const target = iface.descriptor.create(constructorArgs);
  const result: unknown = await operation.run(target, operationArgs);

  if (iface.print && options.print !== undefined) {
    options.print(result);
  }
  return result;
}
