/**
 * Rigging Target Loader — Target Loader
 *
 * Validates a manifest, builds one of the two interface shapes from it, and
 * registers the result. Configuration interfaces are registered together
 * with the commit callback of the store that owns their object.
 */

import {
  InvalidManifestError,
  MultipleResponsibilityInterface,
  SingleResponsibilityInterface,
} from '@rigging/kernel';
import type {
  ConfigInterface,
  MultipleResponsibilityOptions,
  SingleResponsibilityOptions,
  TargetManifest,
} from '@rigging/kernel';
import type { InterfaceRegistry } from './registry.js';
import { TargetValidator } from './validator.js';

export class TargetLoader {
  constructor(
    private readonly registry: InterfaceRegistry,
    private readonly validator: TargetValidator = new TargetValidator(),
  ) {}

  /**
   * @throws {InvalidManifestError} If the manifest fails validation
   * @throws {MissingTypeAnnotationError} If a constructor parameter is untyped
   * @throws {UnknownOperationError} If the entry operation does not exist
   */
  loadSingle<T>(
    component: string,
    manifest: TargetManifest<T>,
    options: SingleResponsibilityOptions,
  ): SingleResponsibilityInterface<T> {
    this.validate(manifest);
    const iface = new SingleResponsibilityInterface(manifest, options);
    this.registry.register({ kind: 'manager', component, iface });
    return iface;
  }

  /**
   * @throws {InvalidManifestError} If the manifest fails validation
   * @throws {MissingTypeAnnotationError} If a constructor parameter is untyped
   */
  loadMultiple<T>(
    component: string,
    manifest: TargetManifest<T>,
    options: MultipleResponsibilityOptions,
  ): MultipleResponsibilityInterface<T> {
    this.validate(manifest);
    const iface = new MultipleResponsibilityInterface(manifest, options);
    this.registry.register({ kind: 'manager', component, iface });
    return iface;
  }

  loadConfig<C>(component: string, iface: ConfigInterface<C>, commit: (config: C) => void): void {
    this.registry.register({
      kind: 'config',
      component,
      iface,
      commit: () => commit(iface.config),
    });
  }

  private validate<T>(manifest: TargetManifest<T>): void {
    const result = this.validator.validateManifest(manifest);
    if (!result.ok) {
      throw new InvalidManifestError(manifest.layer_id, result.errors);
    }
  }
}
