/**
 * Merge the issues of two independent checkers over the same text.
 *
 * The primary checker is authoritative: a secondary issue sharing any
 * offset with a primary issue is dropped, whatever its kind. Output is the
 * primary list in order, then the surviving secondary issues in order.
 */

import type { Issue, MergeOptions } from '../types.js'
import { rangesOverlap } from './textRange.js'
import { filterAcronyms, filterLikelyNames } from './filters.js'

export interface SecondaryPartition {
  kept: Issue[]
  dropped: Issue[]
}

/**
 * Split secondary issues into those disjoint from every primary range and
 * those shadowed by one.
 */
export function partitionSecondary(
  primary: readonly Issue[],
  secondary: readonly Issue[],
): SecondaryPartition {
  const kept: Issue[] = []
  const dropped: Issue[] = []
  for (const issue of secondary) {
    const shadowed = primary.some((p) => rangesOverlap(p.range, issue.range))
    if (shadowed) {
      dropped.push(issue)
    } else {
      kept.push(issue)
    }
  }
  return { kept, dropped }
}

export function mergeIssues(
  primary: readonly Issue[],
  secondary: readonly Issue[],
  text: string,
  options: MergeOptions = {},
): Issue[] {
  let merged = [...primary, ...partitionSecondary(primary, secondary).kept]

  if (options.dropLikelyNames) merged = filterLikelyNames(merged, text)
  if (options.dropAcronyms) merged = filterAcronyms(merged)

  return merged
}
