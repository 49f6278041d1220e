/**
 * Size limits for compact surfaces (tooltips, status text, side panels).
 */

const ELLIPSIS = '…'
const LINE_TERMINATOR = /\r\n|[\n\r\u0085\u2028\u2029]/g

/** First `limit` items in order; zero or negative limits give an empty list */
export function cappedItems<T>(items: readonly T[], limit = 5): T[] {
  return items.slice(0, Math.max(limit, 0))
}

/**
 * Collapse the text onto one line and cut it to `maxLength` characters
 * (code points), ending with an ellipsis when cut.
 */
export function truncatePreview(text: string, maxLength: number): string {
  const singleLine = text.replace(LINE_TERMINATOR, ' ').trim()
  const chars = Array.from(singleLine)
  if (chars.length <= maxLength) return singleLine
  if (maxLength <= 0) return ''

  return chars.slice(0, maxLength - 1).join('') + ELLIPSIS
}
