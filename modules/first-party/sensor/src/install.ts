/**
 * Rigging First-Party Sensor Module — Install Manager
 *
 * Records an installation in the service table. Nothing is downloaded or
 * written outside the rigging home.
 */

import { ParamType } from '@rigging/kernel';
import type { TargetManifest } from '@rigging/kernel';
import { SENSOR_SERVICE } from './process.js';
import type { ServiceRecord, ServiceTable } from './services.js';

export const DEFAULT_INSTALL_DIRECTORY = '/opt/rigging/sensor';

export class SensorInstallError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SensorInstallError';
  }
}

export class SensorInstallManager {
  constructor(
    private readonly services: ServiceTable,
    readonly installDirectory: string,
    readonly networkInterfaces: ReadonlyArray<string>,
    readonly threads: number | null = null,
  ) {}

  /**
   * @throws {SensorInstallError} If the sensor is installed and `overwrite` is false
   */
  setup(overwrite = false): ServiceRecord {
    const current = this.services.get(SENSOR_SERVICE);
    if (current.installed && !overwrite) {
      throw new SensorInstallError(
        `${SENSOR_SERVICE} is already installed in ${current.install_directory ?? DEFAULT_INSTALL_DIRECTORY}; ` +
          'pass --overwrite to reinstall',
      );
    }
    if (this.networkInterfaces.length === 0) {
      throw new SensorInstallError('at least one network interface is required');
    }
    return this.services.update(SENSOR_SERVICE, {
      installed: true,
      running: false,
      started_at: null,
      install_directory: this.installDirectory,
      network_interfaces: [...this.networkInterfaces],
      threads: this.threads ?? this.networkInterfaces.length,
    });
  }
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export function sensorInstallManifest(services: ServiceTable): TargetManifest<SensorInstallManager> {
  return {
    layer_id: 'sensor-install',
    description: 'Install the sensor and choose the interfaces it monitors.',
    constructor_params: [
      {
        name: 'install_directory',
        type: ParamType.String,
        default: DEFAULT_INSTALL_DIRECTORY,
        description: 'Path to the sensor install directory',
      },
      {
        name: 'network_interfaces',
        type: ParamType.list(ParamType.String),
        description: 'Network interfaces the sensor monitors',
      },
      {
        name: 'sensor_threads',
        type: ParamType.optional(ParamType.Integer),
        description: 'Worker threads; one per interface when unset',
      },
    ],
    create: (args) => {
      const threads = args['sensor_threads'];
      return new SensorInstallManager(
        services,
        String(args['install_directory'] ?? DEFAULT_INSTALL_DIRECTORY),
        stringList(args['network_interfaces']),
        typeof threads === 'number' ? threads : null,
      );
    },
    operations: [
      {
        name: 'setup',
        params: [{ name: 'overwrite', type: ParamType.Boolean, description: 'Reinstall over an existing installation' }],
        description: 'Install the sensor',
        run: (manager, args) => manager.setup(args['overwrite'] === true),
      },
    ],
  };
}
