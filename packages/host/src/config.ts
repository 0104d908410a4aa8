/**
 * ContractCheck Host — Configuration
 *
 * `state/config.json` under the home directory. Missing keys, and keys of
 * the wrong type, take their defaults; unknown keys are ignored.
 */

import type { ValidationResult } from '@contractcheck/contract-model';
import type { StateIO } from './state/state-io.js';

export interface ContractCheckConfig {
  /** Append every validation outcome to logs/validations.jsonl. */
  readonly logging: boolean;
  /** Register the built-in catalog before user manifests. */
  readonly builtins: boolean;
}

export type ConfigKey = keyof ContractCheckConfig;

export const CONFIG_FILE = 'config.json';

export const DEFAULT_CONFIG: ContractCheckConfig = Object.freeze({ logging: true, builtins: true });

export const CONFIG_KEYS: ReadonlyArray<ConfigKey> = ['logging', 'builtins'];

export function loadConfig(io: StateIO): ContractCheckConfig {
  const raw = io.readJson(CONFIG_FILE);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return DEFAULT_CONFIG;
  }
  const record: Record<string, unknown> = { ...raw };
  return {
    logging: booleanOr(record['logging'], DEFAULT_CONFIG.logging),
    builtins: booleanOr(record['builtins'], DEFAULT_CONFIG.builtins),
  };
}

export function saveConfig(io: StateIO, config: ContractCheckConfig): void {
  io.writeJson(CONFIG_FILE, config);
}

/**
 * Apply a `key=value` change given as CLI strings.
 *
 * Booleans accept `true`/`false`, `on`/`off` and `yes`/`no`.
 */
export function setConfigValue(
  config: ContractCheckConfig,
  key: string,
  value: string,
): ValidationResult<ContractCheckConfig> {
  const configKey = CONFIG_KEYS.find((k) => k === key);
  if (configKey === undefined) {
    return {
      ok: false,
      errors: [{ message: `Unknown config key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}` }],
    };
  }
  const parsed = parseBoolean(value);
  if (parsed === undefined) {
    return {
      ok: false,
      errors: [{ message: `"${value}" is not a boolean`, context: configKey }],
    };
  }
  return { ok: true, value: { ...config, [configKey]: parsed } };
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'on':
    case 'yes':
      return true;
    case 'false':
    case 'off':
    case 'no':
      return false;
    default:
      return undefined;
  }
}
