/**
 * Cyberdeck Kernel — Audit Logger
 *
 * The audit log is append-only and separate from the application log. It
 * records every security-relevant action: gate decisions, validation
 * outcomes, credential use, and tool lifecycle events.
 *
 * The kernel owns the AuditSink contract and this logger. Concrete sinks
 * (file, memory) are injected by the runtime host. With no sink, log() is
 * a no-op, which is how kernel unit tests run.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Severity of an audit event. */
export enum AuditLevel {
  Info = 'INFO',
  Warning = 'WARNING',
  Error = 'ERROR',
}

/** Free-form structured detail attached to an audit event. */
export type AuditDetails = Readonly<Record<string, unknown>>;

/**
 * One audit record. Persisted as one line per event with the timestamp,
 * level and event-type prefix, followed by the details.
 */
export interface AuditEvent {
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly level: AuditLevel;
  /** Upper-case event family, e.g. `COMMAND`, `SUDO`, `VALIDATION`. */
  readonly event_type: string;
  readonly details: AuditDetails;
}

/**
 * A sink that receives and persists audit events.
 *
 * append() must complete before it returns. Implementations must not
 * silently discard events.
 */
export interface AuditSink {
  append(event: AuditEvent): void;
}

/** Millisecond wall clock. Injected so tests control time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

// ---------------------------------------------------------------------------
// AuditLogger
// ---------------------------------------------------------------------------

export class AuditLogger {
  constructor(
    private readonly sink?: AuditSink,
    private readonly now: Clock = systemClock,
  ) {}

  /**
   * Record an audit event.
   *
   * @param eventType - Event family, e.g. `COMMAND`
   * @param details - Structured key/value detail
   * @param level - Defaults to INFO
   */
  log(eventType: string, details: AuditDetails, level: AuditLevel = AuditLevel.Info): void {
    this.sink?.append({
      timestamp: new Date(this.now()).toISOString(),
      level,
      event_type: eventType,
      details,
    });
  }
}
