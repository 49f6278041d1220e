/**
 * Half-open text ranges over UTF-16 offsets.
 */

import type { TextRange } from '../types.js'

export function textRange(start: number, length: number): TextRange {
  return { start, length }
}

/** Exclusive end offset */
export function rangeEnd(range: TextRange): number {
  return range.start + range.length
}

/**
 * True when the ranges share at least one offset.
 * Touching ranges (one ends where the other starts) do not overlap.
 */
export function rangesOverlap(a: TextRange, b: TextRange): boolean {
  return a.start < rangeEnd(b) && b.start < rangeEnd(a)
}

export function rangeContains(range: TextRange, offset: number): boolean {
  return offset >= range.start && offset < rangeEnd(range)
}
