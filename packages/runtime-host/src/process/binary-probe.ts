/**
 * Cyberdeck Runtime Host — Binary Probe
 *
 * Reports which whitelisted commands are not installed. A dependency is
 * present when its canonical whitelist path is an executable file; names
 * outside the whitelist are looked up on PATH.
 */

import { accessSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';
import { COMMAND_WHITELIST } from '@cyberdeck/kernel';
import type { WhitelistEntry } from '@cyberdeck/kernel';

export interface BinaryProbeOptions {
  readonly whitelist?: ReadonlyMap<string, WhitelistEntry> | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class BinaryProbe {
  private readonly whitelist: ReadonlyMap<string, WhitelistEntry>;
  private readonly searchPath: ReadonlyArray<string>;

  constructor(options: BinaryProbeOptions = {}) {
    this.whitelist = options.whitelist ?? COMMAND_WHITELIST;
    const env = options.env ?? process.env;
    this.searchPath = (env['PATH'] ?? '').split(delimiter).filter((dir) => dir !== '');
  }

  isInstalled(name: string): boolean {
    const entry = this.whitelist.get(name);
    if (entry !== undefined) return isExecutable(entry.path);
    return this.searchPath.some((dir) => isExecutable(join(dir, name)));
  }

  missing(dependencies: ReadonlyArray<string>): ReadonlyArray<string> {
    return dependencies.filter((name) => !this.isInstalled(name));
  }
}
