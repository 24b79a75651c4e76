import { ValidationError } from '@cyberdeck/kernel'

/**
 * splitCommandLine — split a shell line into arguments.
 *
 * Whitespace separates arguments. Single quotes keep everything literally;
 * double quotes keep everything except `\"` and `\\`; outside quotes a
 * backslash escapes the next character. Nothing is expanded: the tokens go
 * to Commander, never to a shell.
 *
 * @throws {ValidationError} On an unterminated quote
 */
export function splitCommandLine(line: string): string[] {
  const tokens: string[] = []
  let current = ''
  let inToken = false
  let quote: '"' | "'" | null = null

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i)

    if (quote === "'") {
      if (ch === "'") quote = null
      else current += ch
      continue
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null
      } else if (ch === '\\' && (line.charAt(i + 1) === '"' || line.charAt(i + 1) === '\\')) {
        current += line.charAt(i + 1)
        i++
      } else {
        current += ch
      }
      continue
    }

    if (ch === "'" || ch === '"') {
      quote = ch
      inToken = true
    } else if (ch === '\\' && i + 1 < line.length) {
      current += line.charAt(i + 1)
      inToken = true
      i++
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current)
      current = ''
      inToken = false
    } else {
      current += ch
      inToken = true
    }
  }

  if (quote !== null) {
    throw new ValidationError('line', line, `Unterminated ${quote} quote`)
  }
  if (inToken) tokens.push(current)
  return tokens
}
