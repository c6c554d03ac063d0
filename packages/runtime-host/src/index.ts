/**
 * @warden/runtime-host
 *
 * Warden runtime host — the side-effectful half of the engine. Implements
 * the HostEnvironment contract from @warden/confine and the LogSink
 * contract from @warden/kernel with Node.js built-ins.
 *
 * No core package imports from this package.
 */

// Host environment
export type { NodeHostEnvironmentOptions } from './host/node-environment.js';
export { NodeHostEnvironment } from './host/node-environment.js';
export {
  collectSystemFacts,
  kernelName,
  operatingSystemFacts,
  parseOsRelease,
} from './host/system-facts.js';
export {
  FACTS_FILE,
  FEATURES_FILE,
  HostConfigurationError,
  loadOperatorState,
  validateFacts,
  validateFeatures,
} from './host/operator-state.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Warden home resolution
export type { ResolveWardenHomeOptions } from './home.js';
export {
  getOsConfigPath,
  readWardenHomeFromConfig,
  resolveWardenHome,
  writeWardenHomeToConfig,
} from './home.js';

// Logging
export { CONFINEMENT_LOG, FileLogSink } from './logging/file-log-sink.js';
export type { ConfinementLogEntry, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readConfinementLog } from './logging/log-reader.js';
export { ulid, ulidTime } from './logging/ulid.js';
