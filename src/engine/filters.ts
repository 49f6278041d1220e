/**
 * Filter false positives from checker results and describe what is left.
 * Removes ignored words, likely names and acronyms flagged as misspellings.
 */

import type { Issue, IssueKind, TextRange } from '../types.js'
import { getTranslations, type SurfaceTranslations } from '../i18n.js'

/** Punctuation that ends a sentence; a capital after it is not a name signal */
const SENTENCE_END = new Set(['.', '!', '?'])

const ACRONYM_PATTERN = /^[A-Z0-9]+$/
const HAS_LETTER = /[A-Z]/

/** SF Symbols names used by the issue list */
const KIND_ICONS: Record<IssueKind, string> = {
  spelling: 'textformat.abc.dottedunderline',
  grammar: 'text.badge.xmark',
  style: 'paintbrush.pointed',
}

/**
 * Drop issues whose word the user chose to ignore (case-insensitive).
 */
export function filterIgnoredWords(issues: readonly Issue[], ignoredWords: Iterable<string>): Issue[] {
  const ignored = new Set([...ignoredWords].map((w) => w.toLowerCase()))
  if (ignored.size === 0) return [...issues]
  return issues.filter((issue) => !ignored.has(issue.word.toLowerCase()))
}

/**
 * A capitalized word in the middle of a sentence is probably a name.
 * Words at the start of the text or right after . ! ? are not, since
 * capitalization there says nothing.
 */
export function isLikelyProperNoun(word: string, range: TextRange, text: string): boolean {
  if (word.length <= 1) return false
  const first = word[0]
  if (first === first.toLowerCase()) return false
  if (isLikelyAcronym(word)) return false

  const before = text.slice(0, Math.max(range.start, 0)).trimEnd()
  if (!before) return false
  return !SENTENCE_END.has(before[before.length - 1])
}

export function filterLikelyNames(issues: readonly Issue[], text: string): Issue[] {
  return issues.filter(
    (issue) => issue.kind !== 'spelling' || !isLikelyProperNoun(issue.word, issue.range, text),
  )
}

/** Two or more uppercase letters/digits with at least one letter (API, LLM, H264) */
export function isLikelyAcronym(word: string): boolean {
  return word.length >= 2 && ACRONYM_PATTERN.test(word) && HAS_LETTER.test(word)
}

export function filterAcronyms(issues: readonly Issue[]): Issue[] {
  return issues.filter((issue) => issue.kind !== 'spelling' || !isLikelyAcronym(issue.word))
}

export interface TextBounds {
  minTextLength: number
  maxTextLength: number
}

/**
 * Whether a text is worth sending to the checkers at all.
 */
export function shouldCheck(text: string, bounds: TextBounds): boolean {
  return text.length >= bounds.minTextLength && text.length <= bounds.maxTextLength
}

export function issuesByKind(issues: readonly Issue[]): Record<IssueKind, Issue[]> {
  const groups: Record<IssueKind, Issue[]> = { spelling: [], grammar: [], style: [] }
  for (const issue of issues) {
    groups[issue.kind].push(issue)
  }
  return groups
}

/**
 * One-line summary, e.g. "2 spelling issues, 1 grammar issue".
 */
export function summaryText(issues: readonly Issue[], t: SurfaceTranslations = getTranslations()): string {
  if (issues.length === 0) return t.noIssues

  const { spelling, grammar, style } = issuesByKind(issues)
  const parts: string[] = []
  if (spelling.length > 0) parts.push(t.spellingIssues(spelling.length))
  if (grammar.length > 0) parts.push(t.grammarIssues(grammar.length))
  if (style.length > 0) parts.push(t.styleSuggestions(style.length))
  return parts.join(', ')
}

/**
 * `Spelling: "teh" → "the"`, or without the arrow when there is no suggestion.
 */
export function issueDescription(issue: Issue, t: SurfaceTranslations = getTranslations()): string {
  const label = t[issue.kind]
  const top = issue.suggestions[0]
  if (top === undefined) return `${label}: "${issue.word}"`
  return `${label}: "${issue.word}" → "${top}"`
}

export function iconName(kind: IssueKind): string {
  return KIND_ICONS[kind]
}
