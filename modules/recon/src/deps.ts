/**
 * Cyberdeck Recon — Shared Service Dependencies
 *
 * Every recon service reaches the OS only through the injected CommandGate.
 */

import type { AuditLogger, Clock, CommandGate, Logger } from '@cyberdeck/kernel';

export interface ReconDeps {
  readonly gate: CommandGate;
  readonly audit?: AuditLogger | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: Clock | undefined;
}
