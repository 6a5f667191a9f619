/**
 * Rigging First-Party Sensor Module — Process Managers
 *
 * BaseProcessManager carries the start/stop/restart/status operations every
 * service shares, and PROCESS_LAYER exposes them. A service's manifest
 * extends that layer and overrides what it needs.
 */

import { ParamType } from '@rigging/kernel';
import type { OperationLayer, TargetManifest } from '@rigging/kernel';
import type { ServiceTable } from './services.js';

export const SENSOR_SERVICE = 'sensor';

export interface ProcessStatus {
  readonly service: string;
  readonly running: boolean;
  readonly started_at: string | null;
  readonly install_directory?: string | null;
  readonly network_interfaces?: ReadonlyArray<string>;
}

export class ServiceNotInstalledError extends Error {
  constructor(readonly service: string) {
    super(`${service} is not installed. Install it with 'rig ${service} install -h'`);
    this.name = 'ServiceNotInstalledError';
  }
}

export class BaseProcessManager {
  constructor(
    protected readonly services: ServiceTable,
    readonly serviceName: string,
    readonly verbose = false,
    readonly prettyPrintStatus = false,
  ) {}

  /** @returns false if the service was already running */
  start(): boolean {
    if (this.services.get(this.serviceName).running) {
      return false;
    }
    this.services.update(this.serviceName, { running: true, started_at: this.services.now() });
    return true;
  }

  /** @returns false if the service was not running */
  stop(): boolean {
    if (!this.services.get(this.serviceName).running) {
      return false;
    }
    this.services.update(this.serviceName, { running: false, started_at: null });
    return true;
  }

  restart(): boolean {
    this.stop();
    return this.start();
  }

  status(): ProcessStatus | string {
    const record = this.services.get(this.serviceName);
    const status: ProcessStatus = this.verbose
      ? {
          service: this.serviceName,
          running: record.running,
          started_at: record.started_at,
          install_directory: record.install_directory,
          network_interfaces: record.network_interfaces,
        }
      : { service: this.serviceName, running: record.running, started_at: record.started_at };
    return this.prettyPrintStatus ? formatStatus(status) : status;
  }
}

export function formatStatus(status: ProcessStatus): string {
  const lines = [`${status.service}: ${status.running ? 'running' : 'stopped'}`];
  if (status.started_at !== null) {
    lines.push(`  since: ${status.started_at}`);
  }
  if (status.install_directory !== undefined && status.install_directory !== null) {
    lines.push(`  directory: ${status.install_directory}`);
  }
  if (status.network_interfaces !== undefined && status.network_interfaces.length > 0) {
    lines.push(`  interfaces: ${status.network_interfaces.join(', ')}`);
  }
  return lines.join('\n');
}

export class SensorProcessManager extends BaseProcessManager {
  /**
   * @throws {ServiceNotInstalledError} If the sensor has not been installed
   */
  constructor(services: ServiceTable, verbose = false, prettyPrintStatus = false) {
    super(services, SENSOR_SERVICE, verbose, prettyPrintStatus);
    if (!services.get(SENSOR_SERVICE).installed) {
      throw new ServiceNotInstalledError(SENSOR_SERVICE);
    }
  }
}

// ---------------------------------------------------------------------------
// Manifests
// ---------------------------------------------------------------------------

export const PROCESS_LAYER: OperationLayer<BaseProcessManager> = {
  layer_id: 'process',
  operations: [
    { name: 'start', params: [], description: 'Start the service', run: (manager) => manager.start() },
    { name: 'stop', params: [], description: 'Stop the service', run: (manager) => manager.stop() },
    { name: 'restart', params: [], description: 'Restart the service', run: (manager) => manager.restart() },
    {
      name: 'status',
      params: [],
      description: 'Report whether the service is running',
      run: (manager) => manager.status(),
    },
  ],
};

export function sensorProcessManifest(services: ServiceTable): TargetManifest<SensorProcessManager> {
  return {
    layer_id: 'sensor-process',
    description: 'Start or stop the sensor and check its status.',
    constructor_params: [
      { name: 'verbose', type: ParamType.Boolean, description: 'Include installation details in the status' },
      {
        name: 'pretty_print_status',
        type: ParamType.Boolean,
        description: 'Print the status in a human readable form',
      },
    ],
    create: (args) =>
      new SensorProcessManager(services, args['verbose'] === true, args['pretty_print_status'] === true),
    extends: PROCESS_LAYER,
    operations: [],
  };
}
