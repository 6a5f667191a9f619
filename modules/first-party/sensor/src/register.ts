/**
 * Rigging First-Party Sensor Module — Registration
 *
 * Builds the sensor's four sub-interfaces and registers them under the
 * `sensor` component:
 *
 *   install  single-responsibility, entry `setup`
 *   process  multiple-responsibility, start | stop | restart | status
 *   scripts  analyzer collection
 *   sink     target configuration
 */

import { AnalyzersInterface, TargetConfigInterface } from '@rigging/kernel';
import type { ConfigObjectStore, TargetLoader } from '@rigging/target-loader';
import { sensorInstallManifest } from './install.js';
import { sensorProcessManifest } from './process.js';
import { SensorScripts } from './scripts.js';
import type { ServiceTable } from './services.js';
import { loadEventSink, saveEventSink } from './sink.js';

export const SENSOR_COMPONENT = 'sensor';

export interface SensorContext {
  readonly loader: TargetLoader;
  readonly store: ConfigObjectStore;
  readonly services: ServiceTable;
}

export function registerSensor({ loader, store, services }: SensorContext): void {
  loader.loadSingle(SENSOR_COMPONENT, sensorInstallManifest(services), {
    name: 'install',
    entry: 'setup',
  });

  loader.loadMultiple(SENSOR_COMPONENT, sensorProcessManifest(services), {
    name: 'process',
    operations: ['start', 'stop', 'restart', 'status'],
  });

  loader.loadConfig(
    SENSOR_COMPONENT,
    new AnalyzersInterface(SensorScripts.load(store), {
      name: 'scripts',
      description: 'Enable or disable the analysis scripts the sensor loads.',
    }),
    (scripts) => scripts.save(store),
  );

  loader.loadConfig(
    SENSOR_COMPONENT,
    new TargetConfigInterface(loadEventSink(store), {
      name: 'sink',
      description: 'Configure where the sensor sends events.',
    }),
    (sink) => saveEventSink(store, sink),
  );
}
