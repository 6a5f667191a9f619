/**
 * Rigging CLI — Component Catalog and Runtime
 *
 * The first-party components, and the runtime they are registered into:
 * one registry, one configuration store and one change logger over a
 * single StateIO.
 */

import { ChangeLogger } from '@rigging/kernel'
import { FileChangeSink } from '@rigging/runtime-host'
import type { StateIO } from '@rigging/runtime-host'
import { ConfigObjectStore, InterfaceRegistry, TargetLoader } from '@rigging/target-loader'
import { SENSOR_COMPONENT, ServiceTable, registerSensor } from '@rigging/module-sensor'
import type { SensorContext } from '@rigging/module-sensor'

export interface ComponentEntry {
  readonly name: string
  readonly description: string
  register(context: SensorContext): void
  /**
   * After any action of `iface` other than `action`, the CLI runs `action`
   * and prints its result instead.
   */
  readonly statusFollowUp?: { readonly iface: string; readonly action: string } | undefined
}

export const FIRST_PARTY_COMPONENTS: ReadonlyArray<ComponentEntry> = [
  {
    name: SENSOR_COMPONENT,
    description: 'Install and run the network sensor, and configure its scripts and event sink',
    register: registerSensor,
    statusFollowUp: { iface: 'process', action: 'status' },
  },
]

export interface CliRuntime {
  readonly stateIO: StateIO
  readonly registry: InterfaceRegistry
  readonly changeLogger: ChangeLogger
  readonly components: ReadonlyArray<ComponentEntry>
}

export interface RuntimeOptions {
  readonly clock?: (() => Date) | undefined
  readonly nextId?: (() => string) | undefined
  readonly components?: ReadonlyArray<ComponentEntry> | undefined
}

/**
 * Register every component against `stateIO`. Configuration objects are
 * loaded here, so the grammars of config interfaces reflect stored state.
 */
export function buildRuntime(stateIO: StateIO, options: RuntimeOptions = {}): CliRuntime {
  const registry = new InterfaceRegistry()
  const context: SensorContext = {
    loader: new TargetLoader(registry),
    store: new ConfigObjectStore(stateIO),
    services: new ServiceTable(stateIO, options.clock),
  }
  const components = options.components ?? FIRST_PARTY_COMPONENTS
  for (const component of components) {
    component.register(context)
  }
  return {
    stateIO,
    registry,
    changeLogger: new ChangeLogger(new FileChangeSink(stateIO, options.nextId), options.clock),
    components,
  }
}
