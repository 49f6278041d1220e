/**
 * LanguageTool result adapter.
 * Converts the `matches` of a LanguageTool /v2/check response (fetched by
 * the host) into Issue[], so LanguageTool can serve as either checker in
 * mergeIssues.
 */

import type { Logger } from 'pino'
import type { Issue, IssueKind } from '../types.js'
import { LOG_PREFIX } from '../logger.js'
import { textRange } from './textRange.js'

const MAX_SUGGESTIONS = 3

const STYLE_CATEGORIES = new Set(['STYLE', 'TYPOGRAPHY', 'REDUNDANCY', 'PLAIN_ENGLISH'])

export interface LTMatch {
  message: string
  offset: number
  length: number
  replacements: Array<{ value: string }>
  rule: {
    id: string
    category: { id: string; name?: string }
    isPremium?: boolean
  }
}

export function kindForMatch(match: LTMatch): IssueKind {
  const category = match.rule.category.id
  const ruleId = match.rule.id
  if (category === 'TYPOS' || ruleId.includes('MORFOLOGIK') || ruleId.includes('SPELL')) {
    return 'spelling'
  }
  if (STYLE_CATEGORIES.has(category)) return 'style'
  return 'grammar'
}

/**
 * Convert LanguageTool matches into issues over `text`.
 * Matches with a fractional, empty or out-of-bounds range are skipped.
 */
export function issuesFromLanguageTool(
  matches: readonly LTMatch[],
  text: string,
  logger?: Logger,
): Issue[] {
  const issues: Issue[] = []
  for (const m of matches) {
    const end = m.offset + m.length
    const integral = Number.isInteger(m.offset) && Number.isInteger(m.length)
    if (!integral || !(m.length > 0) || !(m.offset >= 0) || end > text.length) {
      logger?.warn(
        `${LOG_PREFIX} Skipping LanguageTool match ${m.rule.id} at ${m.offset}+${m.length} (text length ${text.length})`,
      )
      continue
    }
    issues.push({
      word: text.slice(m.offset, end),
      range: textRange(m.offset, m.length),
      kind: kindForMatch(m),
      suggestions: m.replacements.slice(0, MAX_SUGGESTIONS).map((r) => r.value),
    })
  }
  return issues
}
