/**
 * Cyberdeck Runtime Host — Privilege Drop
 *
 * When the deck is started as root (to open raw sockets or configure
 * interfaces), it drops to an unprivileged user once start-up is done.
 * Groups, then gid, then uid: the uid change is what removes the right to
 * change the other two. There is no way back up.
 */

import type { AuditLogger, Logger } from '@cyberdeck/kernel';
import { AuditLevel, NOOP_LOGGER, errorMessage } from '@cyberdeck/kernel';

/** The process credential calls privilege dropping needs. */
export interface PrivilegeOps {
  getuid(): number;
  setgroups(groups: ReadonlyArray<number>): void;
  setgid(id: number): void;
  setuid(id: number): void;
}

export interface DropTarget {
  readonly uid: number;
  readonly gid: number;
}

/**
 * The running process's credential calls, or null on platforms without them.
 */
export function processPrivilegeOps(): PrivilegeOps | null {
  const getuid = process.getuid?.bind(process);
  const setgroups = process.setgroups?.bind(process);
  const setgid = process.setgid?.bind(process);
  const setuid = process.setuid?.bind(process);
  if (getuid === undefined || setgroups === undefined || setgid === undefined || setuid === undefined) {
    return null;
  }
  return {
    getuid: () => getuid(),
    setgroups: (groups) => { setgroups([...groups]); },
    setgid: (id) => { setgid(id); },
    setuid: (id) => { setuid(id); },
  };
}

/**
 * Drop root privileges to `target`.
 *
 * @returns true if privileges were dropped; false if not running as root,
 *   the platform lacks the calls, or the uid did not change
 * @throws The OS error if a credential call fails (after auditing it)
 */
export function dropPrivileges(
  target: DropTarget,
  ops: PrivilegeOps | null,
  audit?: AuditLogger,
  logger: Logger = NOOP_LOGGER,
): boolean {
  if (ops === null) {
    logger.info('Privilege drop unsupported on this platform');
    audit?.log('SUDO', { action: 'privilege drop skipped', reason: 'unsupported platform' });
    return false;
  }

  const currentUid = ops.getuid();
  if (currentUid !== 0) {
    logger.info('Not running as root, privilege drop skipped');
    audit?.log('SUDO', { action: 'privilege drop skipped', reason: 'not root', current_uid: currentUid });
    return false;
  }

  logger.warn(`Dropping privileges from root to uid=${target.uid}`);
  audit?.log('SUDO', { action: 'privilege drop initiated', from_uid: currentUid, to_uid: target.uid }, AuditLevel.Warning);

  try {
    ops.setgroups([target.gid]);
    ops.setgid(target.gid);
    ops.setuid(target.uid);
  } catch (err: unknown) {
    logger.error(`Privilege drop failed: ${errorMessage(err)}`);
    audit?.log('SUDO', { action: 'privilege drop error', error: errorMessage(err) }, AuditLevel.Error);
    throw err;
  }

  const uid = ops.getuid();
  if (uid !== target.uid) {
    logger.error(`Privilege drop failed: still uid=${uid}`);
    audit?.log('SUDO', { action: 'privilege drop failed', still_uid: uid }, AuditLevel.Error);
    return false;
  }

  logger.info(`Privileges dropped to uid=${target.uid}`);
  audit?.log('SUDO', { action: 'privilege drop success', new_uid: target.uid });
  return true;
}
