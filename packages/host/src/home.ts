/**
 * ContractCheck Host — Home Directory Resolution
 *
 * Precedence:
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. CONTRACTCHECK_HOME environment variable
 *   3. ~/.contractcheck
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     state/config.json
 *     logs/validations.jsonl
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const HOME_ENV_VAR = 'CONTRACTCHECK_HOME';

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
}

/**
 * Resolve the home directory to an absolute path, creating it if needed.
 */
export function resolveHome(opts?: ResolveHomeOptions): string {
  const fromEnv = process.env[HOME_ENV_VAR];
  let home: string;
  if (opts?.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.contractcheck');
  }
  const absolute = resolve(home);
  mkdirSync(absolute, { recursive: true });
  return absolute;
}
