import type { Deck } from '../deck.js'
import { t } from './theme.js'

/**
 * buildPS1 — construct the colored PS1 prompt string.
 *
 * Format: [cyberdeck:sudo:2 jobs] ❯
 * The sudo segment is green while a password is cached; the jobs segment
 * appears only while background jobs are running or queued.
 */
export function buildPS1(deck: Deck): string {
  const bracket = t.greenDim
  const name    = t.green.bold
  const arrow   = t.greenDim

  const sudo = deck.ctx.sudo.isCached() ? t.green('sudo') : t.dim('user')
  const jobCount = deck.ctx.pool.activeCount + deck.ctx.pool.queuedCount
  const jobs = jobCount > 0 ? bracket(':') + t.cyan(`${jobCount} jobs`) : ''

  return (
    bracket('[') +
    name('cyberdeck') +
    bracket(':') +
    sudo +
    jobs +
    bracket(']') +
    arrow(' ❯ ')
  )
}
