/**
 * @rigging/target-loader
 *
 * Validates target manifests, builds and registers interfaces by component
 * and command name, and persists configuration objects through StateIO.
 */

export { TargetValidator } from './validator.js';
export { TargetLoader } from './loader.js';
export { InterfaceRegistry } from './registry.js';
export type { RegisteredInterface } from './registry.js';
export { ConfigObjectStore } from './config-object-store.js';
export type { PersistedAnalyzer, PersistedTarget } from './config-object-store.js';
