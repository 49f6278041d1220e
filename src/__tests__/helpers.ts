import { pino, type Logger } from 'pino'
import type { Issue, IssueKind } from '../types.js'

export function makeIssue(
  word: string,
  start: number,
  length: number,
  kind: IssueKind = 'spelling',
  suggestions: string[] = [],
): Issue {
  return { word, range: { start, length }, kind, suggestions }
}

/** pino logger writing JSON lines into an array */
export function captureLogger(level = 'info'): { logger: Logger; messages: () => string[] } {
  const lines: string[] = []
  const logger = pino({ level }, { write: (msg: string) => { lines.push(msg) } })
  return {
    logger,
    messages: () => lines.map((line) => String(JSON.parse(line).msg)),
  }
}
