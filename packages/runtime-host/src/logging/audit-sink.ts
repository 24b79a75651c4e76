/**
 * Cyberdeck Runtime Host — Audit Sinks
 *
 * Implements the AuditSink interface from @cyberdeck/kernel.
 *
 *   FileAuditSink   — one line per event in `<home>/logs/audit.log`, rotated
 *                     at 1 MiB with two backups by default
 *   MemoryAuditSink — keeps events in memory for tests and embedded use
 *
 * Line format:
 *   [2026-01-01T00:00:00.000Z] [WARNING] COMMAND: {"cmd":"rm","args":[],"status":"blocked_not_whitelisted"}
 */

import type { AuditEvent, AuditSink } from '@cyberdeck/kernel';
import type { LineWriter } from './rotating-file.js';

export function formatAuditLine(event: AuditEvent): string {
  return `[${event.timestamp}] [${event.level}] ${event.event_type}: ${JSON.stringify(event.details)}`;
}

export class FileAuditSink implements AuditSink {
  constructor(private readonly writer: LineWriter) {}

  append(event: AuditEvent): void {
    this.writer.appendLine(formatAuditLine(event));
  }
}

export class MemoryAuditSink implements AuditSink {
  private readonly recorded: AuditEvent[] = [];

  append(event: AuditEvent): void {
    this.recorded.push(event);
  }

  get events(): ReadonlyArray<AuditEvent> {
    return this.recorded;
  }

  /** Events of one family, e.g. `COMMAND`. */
  ofType(eventType: string): ReadonlyArray<AuditEvent> {
    return this.recorded.filter((e) => e.event_type === eventType);
  }

  clear(): void {
    this.recorded.length = 0;
  }
}
