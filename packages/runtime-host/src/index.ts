/**
 * @rigging/runtime-host
 *
 * Side-effectful implementations behind the kernel's interfaces: state
 * storage, home-directory resolution, and the file-backed change log.
 * Depends on @rigging/kernel; no kernel code imports from this package.
 */

// StateIO: home-scoped I/O
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// RIGGING_HOME resolution with precedence chain
export type { ResolveRiggingHomeOptions } from './home.js';
export {
  RIGGING_HOME_ENV,
  getOsConfigPath,
  readRiggingHomeFromConfig,
  resolveRiggingHome,
  writeRiggingHomeToConfig,
} from './home.js';

// Change log
export { CHANGE_LOG_FILE, FileChangeSink } from './logging/file-change-sink.js';
export type { ChangeLogEvent, ChangeLogReadResult, ChangeLogStats } from './logging/change-log-reader.js';
export { readChangeLog } from './logging/change-log-reader.js';
export { ulid } from './logging/ulid.js';
