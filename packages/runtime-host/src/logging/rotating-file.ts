/**
 * Cyberdeck Runtime Host — Rotating File Writer
 *
 * Size-capped, synchronous line appender. When the next line would push the
 * file past `maxBytes`, the file is shifted to `<name>.1`, `<name>.1` to
 * `<name>.2`, and so on; the file beyond `backups` is deleted.
 *
 * Writes are synchronous so an audit line is on disk before the audited
 * action returns.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync, unlinkSync } from 'node:fs';
import { dirname } from 'node:path';
import { isNodeError } from '../util/errors.js';

export interface RotationOptions {
  readonly maxBytes: number;
  /** Number of rotated files to keep. */
  readonly backups: number;
}

/** Destination for formatted log lines. */
export interface LineWriter {
  appendLine(line: string): void;
}

export class RotatingFileWriter implements LineWriter {
  private size: number;

  constructor(
    readonly path: string,
    private readonly options: RotationOptions,
  ) {
    mkdirSync(dirname(path), { recursive: true });
    this.size = currentSize(path);
  }

  appendLine(line: string): void {
    const text = line + '\n';
    const bytes = Buffer.byteLength(text, 'utf-8');

    if (this.size > 0 && this.size + bytes > this.options.maxBytes) {
      this.rotate();
    }

    appendFileSync(this.path, text, 'utf-8');
    this.size += bytes;
  }

  /** Paths of the live file and its backups, newest first. */
  files(): ReadonlyArray<string> {
    const all = [this.path];
    for (let i = 1; i <= this.options.backups; i++) all.push(`${this.path}.${i}`);
    return all.filter((p) => existsSync(p));
  }

  private rotate(): void {
    const { backups } = this.options;
    if (backups < 1) {
      unlinkSync(this.path);
      this.size = 0;
      return;
    }

    const oldest = `${this.path}.${backups}`;
    if (existsSync(oldest)) unlinkSync(oldest);

    for (let i = backups - 1; i >= 1; i--) {
      const from = `${this.path}.${i}`;
      if (existsSync(from)) renameSync(from, `${this.path}.${i + 1}`);
    }
    renameSync(this.path, `${this.path}.1`);
    this.size = 0;
  }
}

function currentSize(path: string): number {
  try {
    return statSync(path).size;
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return 0;
    throw err;
  }
}
