import * as readline from 'readline'
import { Writable } from 'stream'

/**
 * MutableOutput — a pass-through to a terminal stream that can be muted, so
 * readline stops echoing while a password is typed.
 */
export class MutableOutput extends Writable {
  muted = false

  constructor(private readonly target: NodeJS.WritableStream & { columns?: number }) {
    super()
  }

  get columns(): number {
    return this.target.columns ?? 80
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) this.target.write(chunk)
    callback()
  }
}

/**
 * askHidden — ask a question on `rl` without echoing the answer.
 * `output` must be the MutableOutput the interface writes to.
 */
export function askHidden(rl: readline.Interface, output: MutableOutput, prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      output.muted = false
      output.write('\n')
      resolve(answer)
    })
    output.muted = true
  })
}

/**
 * readSecret — one-off hidden prompt on stdin for the non-interactive path.
 * When stdin is not a terminal the first line is read as-is.
 */
export function readSecret(prompt: string): Promise<string> {
  const output = new MutableOutput(process.stderr)
  const rl = readline.createInterface({
    input:    process.stdin,
    output,
    terminal: process.stdin.isTTY === true,
  })
  return askHidden(rl, output, prompt).finally(() => rl.close())
}
