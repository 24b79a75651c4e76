/**
 * Cyberdeck Runtime Host — Home and Safe Path Tests
 *
 *   PATH-U1: directory components of a file name are discarded
 *   PATH-U2: backslash separators are discarded too
 *   PATH-U3: empty, '.' and '..' names are rejected
 *   PATH-U4: unknown categories are rejected
 *   PATH-U5: the category directory is created on demand
 *   HOME-U1: an explicit home beats CYBERDECK_HOME; empty values are ignored
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@cyberdeck/kernel';
import { PathCategory, getSafePath, isPathCategory } from '../src/paths.js';
import { resolveDeckHome } from '../src/home.js';

function tempHome(): string {
  return mkdtempSync(`${tmpdir()}/cyberdeck-paths-`);
}

describe('getSafePath', () => {
  it('PATH-U1: keeps only the final component', () => {
    const home = tempHome();
    expect(getSafePath(home, PathCategory.Exports, '../../etc/passwd')).toBe(join(home, 'exports', 'passwd'));
    expect(getSafePath(home, 'captures', '/tmp/handshake.cap')).toBe(join(home, 'captures', 'handshake.cap'));
  });

  it('PATH-U2: treats backslashes as separators', () => {
    const home = tempHome();
    expect(getSafePath(home, 'exports', '..\\..\\scan.json')).toBe(join(home, 'exports', 'scan.json'));
  });

  it('PATH-U3: rejects names with nothing usable left', () => {
    const home = tempHome();
    for (const name of ['', '   ', '.', '..', 'logs/..', '/']) {
      expect(() => getSafePath(home, 'exports', name)).toThrow(ValidationError);
    }
  });

  it('PATH-U4: rejects unknown categories', () => {
    const home = tempHome();
    expect(() => getSafePath(home, '../etc', 'passwd')).toThrow('Invalid path category: ../etc');
    expect(isPathCategory('cache')).toBe(true);
    expect(isPathCategory('tmp')).toBe(false);
  });

  it('PATH-U5: creates the category directory; config maps to the home root', () => {
    const home = tempHome();
    expect(existsSync(join(home, 'cache'))).toBe(false);

    getSafePath(home, PathCategory.Cache, 'hosts.json');
    expect(existsSync(join(home, 'cache'))).toBe(true);
    expect(getSafePath(home, PathCategory.Config, 'config.json')).toBe(join(home, 'config.json'));
  });
});

describe('resolveDeckHome', () => {
  it('HOME-U1: follows the precedence chain', () => {
    const explicit = join(tempHome(), 'explicit');
    const fromEnv = join(tempHome(), 'env');

    expect(resolveDeckHome({ home: explicit, env: { CYBERDECK_HOME: fromEnv } })).toBe(explicit);
    expect(existsSync(explicit)).toBe(true);

    expect(resolveDeckHome({ env: { CYBERDECK_HOME: fromEnv } })).toBe(fromEnv);
    expect(existsSync(fromEnv)).toBe(true);

    expect(resolveDeckHome({ home: '', env: { CYBERDECK_HOME: fromEnv } })).toBe(fromEnv);
  });
});
