import type { CliOutput } from '../../commands/session.js'
import type { Deck } from '../../deck.js'
import { t } from '../theme.js'

/**
 * renderHeader — print the startup banner.
 *
 * Two parts:
 *   1. Chip mark + wordmark + tagline
 *   2. Deck summary: tools enabled, sudo state, home directory
 */
export function renderHeader(out: CliOutput, deck: Deck): void {

  // ── Part 1: Brand block ──────────────────────────────────────────────────

  const mark = [
    '   ' + t.greenDim('┌─┬─┬─┐'),
    '   ' + t.greenDim('├─') + t.green.bold('▣') + t.greenDim('─┤') + '      ' + t.green.bold('C Y B E R D E C K'),
    '   ' + t.greenDim('└─┴─┴─┘') + '      ' + t.muted('whitelisted tools · one command gate'),
  ]

  out.line()
  for (const line of mark) out.line(line)

  out.line()
  out.line('  ' + t.dim('─'.repeat(60)))
  out.line()

  // ── Part 2: Deck summary ─────────────────────────────────────────────────

  const stats = deck.registry.statistics()
  const disabled = stats.totalTools - stats.enabledTools

  out.line(
    '  ' + t.muted('tools') + ' ' + t.white(String(stats.enabledTools)) + t.dim(`/${stats.totalTools}`) +
    (disabled > 0 ? '  ' + t.amber(`${disabled} missing dependencies`) : '') +
    '  ' + t.dim('·') +
    '  ' + t.muted('sudo') + ' ' + (deck.ctx.sudo.isCached() ? t.green('cached') : t.dim('not set')),
  )
  out.line('  ' + t.dim('home ' + deck.ctx.home))
  out.line()
  out.line('    ' + t.dim("→  type 'help' for commands"))
}
