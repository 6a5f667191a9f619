/**
 * Rigging Kernel — Descriptor Extractor
 *
 * Turns a TargetManifest into a TargetDescriptor.
 *
 * Extraction rules:
 * - Constructor parameters must all carry a type. A missing type is fatal
 *   for the whole target (MissingTypeAnnotationError).
 * - Operations are collected by walking the layer chain from the manifest
 *   itself down through `extends`. The first definition seen for a name wins,
 *   so a subclass layer shadows its parent's signature.
 * - An operation with an untyped parameter is skipped, not fatal. Its name
 *   still counts as seen: a skipped override does not let the parent's
 *   definition resurface.
 *
 * Extraction is pure. It reads the manifest and allocates new descriptors.
 */

import { MissingTypeAnnotationError } from '../errors.js';
import { RESERVED_NAMES } from '../types/descriptor.js';
import type {
  OperationDescriptor,
  ParameterDescriptor,
  ResolvedOperation,
  TargetDescriptor,
} from '../types/descriptor.js';
import type { OperationLayer, ParameterManifest, TargetManifest } from '../types/manifest.js';

/** Operation names that can never be exposed. */
const CONSTRUCTOR_NAMES: ReadonlySet<string> = new Set(['constructor', 'create']);

/**
 * Extract one parameter. Returns null when the parameter has no type.
 */
export function extractParameter(param: ParameterManifest): ParameterDescriptor | null {
  if (param.type === undefined) {
    return null;
  }
  return {
    name: param.name,
    semantic_type: param.type,
    default: param.default,
    description: param.description ?? '',
    is_reserved: RESERVED_NAMES.has(param.name),
  };
}

/**
 * Extract a parameter list. Returns null if any parameter is untyped,
 * together with the name of the first offender.
 */
function extractParameters(
  params: ReadonlyArray<ParameterManifest>,
): { ok: true; parameters: ParameterDescriptor[] } | { ok: false; untyped: string } {
  const parameters: ParameterDescriptor[] = [];
  for (const param of params) {
    const descriptor = extractParameter(param);
    if (descriptor === null) {
      return { ok: false, untyped: param.name };
    }
    parameters.push(descriptor);
  }
  return { ok: true, parameters };
}

/**
 * Extract the constructor ("base parameters") of a target.
 *
 * @throws {MissingTypeAnnotationError} If any constructor parameter is untyped
 */
export function extractConstructor<T>(manifest: TargetManifest<T>): OperationDescriptor {
  const result = extractParameters(manifest.constructor_params);
  if (!result.ok) {
    throw new MissingTypeAnnotationError(manifest.layer_id, result.untyped);
  }
  return { name: 'constructor', parameters: result.parameters };
}

/**
 * Walk the layer chain and pre-merge operations, most-derived first.
 */
export function extractOperations<T>(root: OperationLayer<T>): {
  operations: Map<string, ResolvedOperation<T>>;
  skipped: string[];
} {
  const operations = new Map<string, ResolvedOperation<T>>();
  const skipped: string[] = [];
  const seen = new Set<string>();
  const visited = new Set<OperationLayer<T>>();

  let layer: OperationLayer<T> | undefined = root;
  while (layer !== undefined && !visited.has(layer)) {
    visited.add(layer);
    for (const op of layer.operations) {
      if (CONSTRUCTOR_NAMES.has(op.name) || seen.has(op.name)) {
        continue;
      }
      seen.add(op.name);
      const result = extractParameters(op.params);
      if (!result.ok) {
        skipped.push(op.name);
        continue;
      }
      const run = op.run.bind(op);
      operations.set(op.name, {
        name: op.name,
        parameters: result.parameters,
        layer_id: layer.layer_id,
        run,
      });
    }
    layer = layer.extends;
  }

  return { operations, skipped };
}

/**
 * Extract a complete TargetDescriptor.
 *
 * @throws {MissingTypeAnnotationError} If any constructor parameter is untyped
 */
export function extractTarget<T>(manifest: TargetManifest<T>): TargetDescriptor<T> {
  const base = extractConstructor(manifest);
  const { operations, skipped } = extractOperations(manifest);
  return {
    target_id: manifest.layer_id,
    description: manifest.description,
    base,
    operations,
    skipped_operations: skipped,
    create: (args) => manifest.create(args),
  };
}
