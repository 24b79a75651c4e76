import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  green:       chalk.hex('#00FF41'),
  greenBright: chalk.hex('#7CFF9B'),
  greenDim:    chalk.hex('#008F11'),
  cyan:        chalk.hex('#00E5FF'),
  text:        chalk.hex('#C8C8C0'),
  white:       chalk.hex('#F2F2EC'),
  dim:         chalk.hex('#444444'),
  muted:       chalk.hex('#666666'),
  amber:       chalk.hex('#D4880A'),
  red:         chalk.hex('#FF3B3B'),
} as const

const _auditLevelColors: Record<string, ChalkInstance> = {
  INFO:    t.text,
  WARNING: t.amber,
  ERROR:   t.red,
}

export const auditLevelColor = (level: string): ChalkInstance =>
  _auditLevelColors[level] ?? t.muted

const _jobStateColors: Record<string, ChalkInstance> = {
  queued:    t.muted,
  running:   t.cyan,
  completed: t.green,
  failed:    t.red,
  cancelled: t.amber,
}

export const jobStateColor = (state: string): ChalkInstance =>
  _jobStateColors[state] ?? t.muted
