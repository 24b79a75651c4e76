/**
 * Cyberdeck Recon — Power Control
 */

import { NOOP_LOGGER } from '@cyberdeck/kernel';
import type { CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';
import { CommandFailedError } from './errors.js';

export type PowerAction = 'reboot' | 'shutdown';

export class PowerControl {
  private readonly gate: CommandGate;
  private readonly logger: Logger;

  constructor(options: ReconDeps) {
    this.gate = options.gate;
    this.logger = (options.logger ?? NOOP_LOGGER).child('power');
  }

  reboot(): Promise<void> {
    return this.run('reboot', []);
  }

  /** `shutdown -h now` */
  shutdown(): Promise<void> {
    return this.run('shutdown', ['-h', 'now']);
  }

  private async run(command: PowerAction, args: ReadonlyArray<string>): Promise<void> {
    this.logger.warn(`System ${command} requested`);
    const result = await this.gate.execute(command, args, { timeoutMs: 5_000, privileged: true });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(command, result);
    }
  }
}
