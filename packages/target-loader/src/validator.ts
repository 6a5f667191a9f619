/**
 * Rigging Target Loader — Manifest Validator
 *
 * Structural checks a manifest must pass before an interface is built from
 * it. The compiler already guarantees most of this for manifests written in
 * TypeScript; the validator covers manifests assembled at run time.
 *
 * A parameter without a type is NOT a validation error. The extractor
 * decides what that means (fatal for constructors, skip for operations).
 */

import { formatType, isSemanticType, valueMatchesType } from '@rigging/kernel';
import type {
  OperationLayer,
  ParameterManifest,
  TargetManifest,
  ValidationError,
  ValidationResult,
} from '@rigging/kernel';

const CONSTRUCTOR_NAMES: ReadonlySet<string> = new Set(['constructor', 'create']);

export class TargetValidator {
  /**
   * Validate a manifest and every layer it extends.
   *
   * Checks:
   * - layer ids are non-empty and the `extends` chain has no cycle
   * - parameter names are non-empty and unique within their signature
   * - declared types are well-formed semantic types
   * - declared defaults match their parameter's type
   * - operation names are unique within their layer and are not constructor names
   */
  validateManifest<T>(manifest: TargetManifest<T>): ValidationResult {
    const errors: ValidationError[] = [];

    errors.push(...this.validateParameters(manifest.constructor_params, `${manifest.layer_id}.constructor`));

    const visited = new Set<OperationLayer<T>>();
    let layer: OperationLayer<T> | undefined = manifest;
    while (layer !== undefined) {
      if (visited.has(layer)) {
        errors.push({
          message: `Layer chain of "${manifest.layer_id}" is cyclic at "${layer.layer_id}"`,
          context: `layer_id: ${layer.layer_id}`,
        });
        break;
      }
      visited.add(layer);
      errors.push(...this.validateLayer(layer));
      layer = layer.extends;
    }

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true };
  }

  private validateLayer<T>(layer: OperationLayer<T>): ValidationError[] {
    const errors: ValidationError[] = [];
    if (layer.layer_id.trim() === '') {
      errors.push({ message: 'Layer id must be a non-empty string' });
    }

    const names = new Set<string>();
    for (const op of layer.operations) {
      const context = `layer_id: ${layer.layer_id}, operation: ${op.name}`;
      if (op.name.trim() === '') {
        errors.push({ message: 'Operation name must be a non-empty string', context });
      } else if (CONSTRUCTOR_NAMES.has(op.name)) {
        errors.push({ message: `Operation name "${op.name}" is reserved for construction`, context });
      }
      if (names.has(op.name)) {
        errors.push({ message: `Duplicate operation "${op.name}" in layer "${layer.layer_id}"`, context });
      }
      names.add(op.name);
      errors.push(...this.validateParameters(op.params, `${layer.layer_id}.${op.name}`));
    }
    return errors;
  }

  /**
   * @param scope - `<layer>.<operation>` label used in messages
   */
  validateParameters(params: ReadonlyArray<ParameterManifest>, scope: string): ValidationError[] {
    const errors: ValidationError[] = [];
    const names = new Set<string>();

    for (const param of params) {
      const context = `${scope}(${param.name})`;
      if (param.name.trim() === '') {
        errors.push({ message: 'Parameter name must be a non-empty string', context });
      }
      if (names.has(param.name)) {
        errors.push({ message: `Duplicate parameter "${param.name}" in ${scope}`, context });
      }
      names.add(param.name);

      if (param.type === undefined) {
        continue;
      }
      if (!isSemanticType(param.type)) {
        errors.push({ message: `Parameter "${param.name}" has a malformed type`, context });
        continue;
      }
      if (param.default !== undefined && !valueMatchesType(param.type, param.default)) {
        errors.push({
          message:
            `Default of "${param.name}" does not match its type ${formatType(param.type)}: ` +
            JSON.stringify(param.default),
          context,
        });
      }
    }
    return errors;
  }
}
