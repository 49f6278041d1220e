/**
 * Issue list as shown in the issues panel: merged, false positives removed,
 * in text order, capped.
 */

import type { Issue } from '../types.js'
import { filterIgnoredWords } from './filters.js'
import { mergeIssues } from './issueMerger.js'
import { cappedItems } from './previewBounds.js'

export interface DisplayOptions {
  maxDisplayIssues: number
  ignoredWords?: Iterable<string>
}

export function prepareDisplayIssues(
  primary: readonly Issue[],
  secondary: readonly Issue[],
  text: string,
  options: DisplayOptions,
): Issue[] {
  const merged = mergeIssues(primary, secondary, text, { dropLikelyNames: true, dropAcronyms: true })
  const visible = filterIgnoredWords(merged, options.ignoredWords ?? [])
  // Array.prototype.sort is stable, so equal starts keep merge order
  const ordered = visible.sort((a, b) => a.range.start - b.range.start)
  return cappedItems(ordered, options.maxDisplayIssues)
}
