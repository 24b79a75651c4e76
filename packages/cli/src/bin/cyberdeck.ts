/**
 * bin/cyberdeck.ts — TTY-aware entry point, run from source by `npm start` (tsx).
 *
 * In a TTY with CYBERDECK_NO_TUI unset and no arguments: launches the
 * interactive readline shell.
 * Otherwise: runs one command through Commander (scripting mode).
 *
 * CYBERDECK_NO_TUI=1 npm start -- status  → one-shot output
 * npm start (in TTY)                      → interactive shell
 */

import { ConfigError } from '@cyberdeck/runtime-host'
import { openDeck } from '../deck.js'
import type { Deck } from '../deck.js'

const args          = process.argv.slice(2)
const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['CYBERDECK_NO_TUI'] === undefined && args.length === 0

let deck: Deck | null = null
try {
  deck = openDeck()
} catch (err: unknown) {
  if (!(err instanceof ConfigError)) throw err
  console.error(err.message)
  process.exitCode = 2
}

if (deck !== null) {
  if (isInteractive) {
    const { launchShell } = await import('../tui/shell.js')
    await launchShell(deck)
  } else {
    const { runOnce } = await import('../main.js')
    process.exitCode = await runOnce(deck, args)
  }
}
