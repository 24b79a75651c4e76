/**
 * Cyberdeck Runtime Host — Audit Log Reader
 *
 * Pure function for reading audit.log content back into events.
 *
 * Guarantees:
 *   AUDR-U1: every well-formed line becomes an AuditEvent, in file order
 *   AUDR-U2: malformed lines (bad prefix, bad JSON, non-object details) are
 *            dropped and counted in parseErrors
 *   AUDR-U3: content not ending with '\n' has its last line dropped and
 *            flagged as a partial write
 *   AUDR-U4: empty input returns an empty result
 *
 * No I/O. Callers read the file (and its rotated backups) themselves.
 */

import { AuditLevel } from '@cyberdeck/kernel';
import type { AuditEvent } from '@cyberdeck/kernel';

export interface AuditReadResult {
  readonly events: ReadonlyArray<AuditEvent>;
  readonly totalLines: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

const LINE = /^\[([^\]]+)\] \[([A-Z]+)\] ([A-Za-z0-9_]+): (.*)$/;

const LEVELS: ReadonlyMap<string, AuditLevel> = new Map(
  Object.values(AuditLevel).map((level) => [level, level]),
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLine(line: string): AuditEvent | null {
  const match = LINE.exec(line);
  if (match === null) return null;

  const [, timestamp, levelText, eventType, json] = match;
  const level = LEVELS.get(levelText ?? '');
  if (timestamp === undefined || level === undefined || eventType === undefined || json === undefined) {
    return null;
  }

  let details: unknown;
  try {
    details = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(details)) return null;

  return { timestamp, level, event_type: eventType, details };
}

export function parseAuditLog(rawContent: string): AuditReadResult {
  if (rawContent.length === 0) {
    return { events: [], totalLines: 0, parseErrors: 0, partialTrailingLine: false };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  const events: AuditEvent[] = [];
  let parseErrors = 0;
  for (const line of lines) {
    const event = parseLine(line);
    if (event === null) {
      parseErrors++;
    } else {
      events.push(event);
    }
  }

  return { events, totalLines: lines.length, parseErrors, partialTrailingLine };
}
