/**
 * Cyberdeck CLI — Deck
 *
 * One running deck: the runtime context, the recon services over it, and a
 * tool registry holding every recon tool. Built once per process by the
 * entry point and handed to the command program and the shell.
 */

import { BinaryProbe, createDeckContext } from '@cyberdeck/runtime-host';
import type { DeckContext, DeckContextOptions } from '@cyberdeck/runtime-host';
import { createReconServices, createReconTools } from '@cyberdeck/module-recon';
import type { ReconServices } from '@cyberdeck/module-recon';
import { ToolRegistry } from '@cyberdeck/tool-registry';
import type { DependencyProbe } from '@cyberdeck/tool-registry';

export interface Deck {
  readonly ctx: DeckContext;
  readonly services: ReconServices;
  readonly registry: ToolRegistry;
  /** Stops every spoof, then tears the context down. Idempotent. */
  shutdown(): Promise<void>;
}

export interface OpenDeckOptions extends DeckContextOptions {
  /** Decides which tools register disabled. Default: check the whitelisted binaries. */
  readonly probe?: DependencyProbe | undefined;
}

export function openDeck(options: OpenDeckOptions = {}): Deck {
  const ctx = createDeckContext(options);
  const services = createReconServices(ctx);
  const registry = new ToolRegistry({
    audit: ctx.audit,
    logger: ctx.logger,
    probe: options.probe ?? new BinaryProbe({ env: options.env }),
    now: ctx.now,
  });
  for (const tool of createReconTools(services)) {
    registry.register(tool);
  }

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (closing === null) {
      closing = (async () => {
        const stopped = await services.spoofer.stopAll();
        if (stopped > 0) ctx.logger.info(`Stopped ${stopped} spoofs on exit`);
        await ctx.shutdown();
      })();
    }
    return closing;
  };

  return { ctx, services, registry, shutdown };
}
