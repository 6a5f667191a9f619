/**
 * @rigging/module-sensor
 *
 * First-party sample targets: a network sensor whose installation and
 * process state are simulated in the rigging home.
 */

export { registerSensor, SENSOR_COMPONENT } from './register.js';
export type { SensorContext } from './register.js';
export { EMPTY_SERVICE_RECORD, SERVICES_FILE, ServiceTable } from './services.js';
export type { ServiceRecord } from './services.js';
export {
  BaseProcessManager,
  PROCESS_LAYER,
  SENSOR_SERVICE,
  SensorProcessManager,
  ServiceNotInstalledError,
  formatStatus,
  sensorProcessManifest,
} from './process.js';
export type { ProcessStatus } from './process.js';
export {
  DEFAULT_INSTALL_DIRECTORY,
  SensorInstallError,
  SensorInstallManager,
  sensorInstallManifest,
} from './install.js';
export { SCRIPTS_FILE, SensorScripts, parseScriptSeed, scriptSeed } from './scripts.js';
export { EVENT_SINK_DEFAULTS, EVENT_SINK_FIELDS, SINK_FILE, loadEventSink, saveEventSink } from './sink.js';
