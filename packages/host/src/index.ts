/**
 * @contractcheck/host
 *
 * The side-effectful layer: state and log I/O, the JSONL validation log,
 * home and configuration resolution, and the built-in catalog.
 */

export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

export { FileLogSink, VALIDATION_LOG } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';
export { queryLog, readLog } from './logging/log-reader.js';
export type { LogEvent, LogQuery, LogReadResult, LogReadStats } from './logging/log-reader.js';

export { HOME_ENV_VAR, resolveHome } from './home.js';
export type { ResolveHomeOptions } from './home.js';

export {
  CONFIG_FILE,
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  loadConfig,
  saveConfig,
  setConfigValue,
} from './config.js';
export type { ConfigKey, ContractCheckConfig } from './config.js';

export { CATALOG_PATH, loadBuiltInCatalog } from './catalog.js';
