/**
 * shell.ts — Cyberdeck interactive readline shell.
 *
 * Two layers:
 *
 * LAYER 1 — READLINE (keystroke hot path)
 *   Node.js readline. Handles prompt display, line editing, history,
 *   submit on Enter, Ctrl+C. Password prompts mute its output.
 *
 * LAYER 2 — COMMAND ROUTING (ShellSession)
 *   Builtins (help, jobs, cancel, exit) are handled here. Every other line
 *   is split into arguments and parsed by a fresh Commander program. Tool
 *   commands become background jobs in the deck's task pool; their output
 *   is printed when they finish.
 */

import * as readline from 'readline'
import type { TaskResult, TaskSnapshot } from '@cyberdeck/runtime-host'
import type { ToolRunResult } from '@cyberdeck/tool-registry'
import { buildProgram } from '../commands/index.js'
import { renderRun, reportError } from '../commands/session.js'
import type { CliOutput, SecretPrompt, ToolLauncher } from '../commands/session.js'
import type { Deck } from '../deck.js'
import { renderHeader } from './output/header.js'
import { renderHelp } from './output/help.js'
import { buildPS1 } from './prompt.js'
import { MutableOutput, askHidden } from './secret.js'
import { jobStateColor, t } from './theme.js'
import { splitCommandLine } from './tokenize.js'

export interface ShellSessionOptions {
  readonly deck: Deck
  readonly out: CliOutput
  readonly askSecret: SecretPrompt
  /** Called after a background job's output has been printed. */
  readonly onJobReported?: (() => void) | undefined
}

export interface ShellSession {
  /** Handle one input line. Resolves false when the shell should exit. */
  handleLine(line: string): Promise<boolean>
  /** Resolves once every finished job has been reported. */
  idle(): Promise<void>
}

function formatJob(job: TaskSnapshot, now: number): string {
  const end = job.finishedAt ?? now
  const elapsed = job.startedAt === null ? '' : `${((end - job.startedAt) / 1000).toFixed(1)}s`
  return (
    '  ' + t.white(`[${job.id}]`.padEnd(6)) +
    jobStateColor(job.state)(job.state.padEnd(10)) +
    t.text(job.label.padEnd(28)) +
    t.muted(elapsed)
  )
}

export function createShellSession(options: ShellSessionOptions): ShellSession {
  const { deck, out, askSecret } = options
  const { pool } = deck.ctx
  const reporting = new Map<number, Promise<void>>()

  const reportJob = (id: number, label: string, result: TaskResult<ToolRunResult>): void => {
    out.line()
    out.line(t.muted(`[job ${id}] ${label}`))
    switch (result.status) {
      case 'completed':
        renderRun(out, label, result.value)
        break
      case 'failed':
        reportError(out, result.error)
        break
      case 'cancelled':
        out.line(t.amber('cancelled before it started'))
        break
    }
    options.onJobReported?.()
  }

  const launch: ToolLauncher = ({ toolId, params, label }) => {
    const handle = pool.submit(label, (signal) => deck.registry.execute(toolId, params ?? {}, signal))
    out.line(t.muted(`[job ${handle.id}] ${handle.state === 'running' ? 'started' : 'queued'}: ${label}`))
    const reported = handle.result.then((result) => {
      reporting.delete(handle.id)
      reportJob(handle.id, label, result)
    })
    reporting.set(handle.id, reported)
    return Promise.resolve()
  }

  const cancelJob = (arg: string): void => {
    const id = Number(arg)
    if (arg === '' || !Number.isInteger(id)) {
      out.line(t.red('usage: cancel <job>'))
      return
    }
    if (pool.cancel(id)) {
      out.line(t.amber(`[job ${id}] cancelled`))
    } else if (pool.kill(id)) {
      out.line(t.amber(`[job ${id}] stopping`))
    } else {
      out.line(t.muted(`[job ${id}] is not queued or running`))
    }
  }

  const listJobs = (): void => {
    const jobs = pool.list()
    if (jobs.length === 0) {
      out.line(t.muted('  (no jobs)'))
      return
    }
    const now = deck.ctx.now()
    for (const job of jobs) out.line(formatJob(job, now))
  }

  const handleLine = async (line: string): Promise<boolean> => {
    const input = line.trim()
    if (input === '') return true

    const [cmd = '', arg = ''] = input.split(/\s+/)

    if (cmd === 'exit' || cmd === 'quit') return false
    if (cmd === 'help' || cmd === '?') {
      renderHelp(out)
      return true
    }
    if (cmd === 'jobs') {
      listJobs()
      return true
    }
    if (cmd === 'cancel') {
      cancelJob(arg)
      return true
    }

    try {
      const program = buildProgram({ deck, out, launch, askSecret })
      await program.parseAsync(splitCommandLine(input), { from: 'user' })
    } catch (err: unknown) {
      reportError(out, err)
    }
    return true
  }

  return {
    handleLine,
    idle: async () => {
      await pool.drain()
      await Promise.all(Array.from(reporting.values()))
    },
  }
}

/**
 * launchShell — entry point for the interactive TTY shell.
 *
 * Called from src/bin/cyberdeck.ts when the process is running in a TTY
 * and CYBERDECK_NO_TUI is not set. Resolves after the deck has shut down.
 */
export async function launchShell(deck: Deck): Promise<void> {
  const screen = new MutableOutput(process.stdout)
  const out: CliOutput = {
    line:  (text = '') => { screen.write(text + '\n') },
    write: (text) => { screen.write(text) },
  }

  renderHeader(out, deck)

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      screen,
    terminal:    true,
    historySize: 50,
  })

  // preserveCursor keeps a half-typed line intact when a job reports.
  const showPrompt = (preserveCursor = false): void => {
    rl.setPrompt(buildPS1(deck))
    rl.prompt(preserveCursor)
  }

  const shell = createShellSession({
    deck,
    out,
    askSecret:     (prompt) => askHidden(rl, screen, prompt),
    onJobReported: () => showPrompt(true),
  })

  out.line()
  showPrompt()

  rl.on('line', (line: string) => {
    shell.handleLine(line)
      .then((keepGoing) => {
        if (keepGoing) showPrompt()
        else rl.close()
      })
      .catch((err: unknown) => {
        reportError(out, err)
        showPrompt()
      })
  })

  // Ctrl+C leaves the shell; running tools are stopped by shutdown.
  rl.on('SIGINT', () => {
    out.line()
    rl.close()
  })

  await new Promise<void>((resolve) => rl.once('close', resolve))

  out.line(t.muted('stopping jobs and spoofs...'))
  deck.ctx.pool.abortAll()
  await deck.shutdown()
}
