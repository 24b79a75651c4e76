/**
 * Cyberdeck Runtime Host — Safe Paths
 *
 * Caller-supplied file names (export names, capture names) are reduced to
 * their final path component and joined to one whitelisted category
 * directory under the deck home. The result can never point outside it.
 */

import { mkdirSync } from 'node:fs';
import { basename, join } from 'node:path';
import { ValidationError } from '@cyberdeck/kernel';

export enum PathCategory {
  Logs = 'logs',
  Cache = 'cache',
  Exports = 'exports',
  Captures = 'captures',
  /** The home directory itself. */
  Config = 'config',
}

const CATEGORY_DIRS: Readonly<Record<PathCategory, string>> = {
  [PathCategory.Logs]: 'logs',
  [PathCategory.Cache]: 'cache',
  [PathCategory.Exports]: 'exports',
  [PathCategory.Captures]: 'captures',
  [PathCategory.Config]: '',
};

export function isPathCategory(value: string): value is PathCategory {
  return Object.values<string>(PathCategory).includes(value);
}

/**
 * Build a path for `filename` inside a category directory of `home`,
 * creating the directory on demand.
 *
 * @throws {ValidationError} Unknown category, or a file name with no usable final component
 */
export function getSafePath(home: string, category: string, filename: string): string {
  if (!isPathCategory(category)) {
    throw new ValidationError('category', category, `Invalid path category: ${category}`);
  }

  // Backslashes are separators for this purpose too.
  const name = basename(filename.replace(/\\/g, '/')).trim();
  if (name === '' || name === '.' || name === '..') {
    throw new ValidationError('filename', filename, `Invalid file name: ${JSON.stringify(filename)}`);
  }

  const dir = join(home, CATEGORY_DIRS[category]);
  mkdirSync(dir, { recursive: true });
  return join(dir, name);
}
