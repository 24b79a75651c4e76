/**
 * Cyberdeck Runtime Host — Deck Home Resolution
 *
 * Resolves the deck's safe root directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. CYBERDECK_HOME environment variable
 *   3. Default: ~/.cyberdeck
 *
 * Everything the deck writes lives under the resolved home:
 *
 *   <CYBERDECK_HOME>/
 *     config.json
 *     logs/        app.log, audit.log (+ rotated backups)
 *     cache/
 *     exports/
 *     captures/
 *
 * Never build paths relative to process.cwd(); use getSafePath().
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const HOME_ENV_VAR = 'CYBERDECK_HOME';

export interface ResolveDeckHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Environment to consult. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the deck home directory, creating it if it does not exist.
 *
 * @returns The absolute path to the resolved home directory
 */
export function resolveDeckHome(opts?: ResolveDeckHomeOptions): string {
  const env = opts?.env ?? process.env;
  const fromEnv = env[HOME_ENV_VAR];

  let home: string;
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.cyberdeck');
  }

  home = resolve(home);
  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}
