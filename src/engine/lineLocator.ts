/**
 * Locate the line under the cursor, for "fix this line" actions.
 *
 * Recognized terminators: \n, \r\n, \r, U+0085, U+2028, U+2029.
 * A cursor sitting on a terminator (including between the \r and \n of a
 * CRLF pair) belongs to the line that terminator ends.
 */

import type { LineLookup } from '../types.js'
import { textRange } from './textRange.js'

const CR = 0x0d
const LF = 0x0a

const TERMINATORS = new Set([LF, CR, 0x85, 0x2028, 0x2029])

/** Tabs and space separators only; \v, \f and U+FEFF count as content */
const BLANK_LINE = /^[\t\p{Zs}]*$/u

function isTerminator(code: number): boolean {
  return TERMINATORS.has(code)
}

function clampCursor(cursor: number, length: number): number {
  if (Number.isNaN(cursor)) return 0
  return Math.min(Math.max(Math.trunc(cursor), 0), length)
}

/** Length of the terminator starting at `index` (0 at end of text) */
function terminatorLength(text: string, index: number): number {
  if (index >= text.length) return 0
  if (text.charCodeAt(index) === CR && text.charCodeAt(index + 1) === LF) return 2
  return 1
}

export function locateLine(text: string, cursor: number): LineLookup {
  const position = clampCursor(cursor, text.length)

  // Walk back to the character after the previous line's terminator
  let lineStart = position
  while (lineStart > 0) {
    const code = text.charCodeAt(lineStart - 1)
    if (!isTerminator(code)) {
      lineStart--
      continue
    }
    // Cursor between \r and \n: that CRLF ends the current line
    if (code === CR && lineStart === position && text.charCodeAt(position) === LF) {
      lineStart--
      continue
    }
    break
  }

  let lineEnd = lineStart
  while (lineEnd < text.length && !isTerminator(text.charCodeAt(lineEnd))) {
    lineEnd++
  }

  const lineText = text.slice(lineStart, lineEnd)
  if (BLANK_LINE.test(lineText)) return { found: false }

  const rangeLength = lineEnd + terminatorLength(text, lineEnd) - lineStart
  return { found: true, lineText, lineRange: textRange(lineStart, rangeLength) }
}
