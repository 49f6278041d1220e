/**
 * Correction surface — Type definitions.
 *
 * Offsets and lengths are UTF-16 code units, i.e. plain JavaScript string
 * indices, matching how editor widgets address text.
 */

import type { Logger } from 'pino'
import type { SurfaceLocale } from './i18n.js'

/** Half-open interval `[start, start + length)` over a text buffer */
export interface TextRange {
  readonly start: number
  readonly length: number
}

export type IssueKind = 'spelling' | 'grammar' | 'style'

export interface Issue {
  /** The exact flagged substring */
  readonly word: string
  readonly range: TextRange
  readonly kind: IssueKind
  /** Candidate replacements, best first (may be empty) */
  readonly suggestions: readonly string[]
}

export interface LineResult {
  /** Line content without its trailing terminator */
  readonly lineText: string
  /** Covers the line including its terminator, for whole-line replacement */
  readonly lineRange: TextRange
}

/** Result of a line lookup. `found: false` means nothing to fix on that line. */
export type LineLookup =
  | ({ readonly found: true } & LineResult)
  | { readonly found: false }

export interface MergeOptions {
  /** Drop spelling issues that look like names (needs the text) */
  dropLikelyNames?: boolean
  /** Drop spelling issues on all-caps acronyms */
  dropAcronyms?: boolean
}

export interface CorrectionSurfaceConfig {
  /** Maximum number of issues shown in the issue panel (default: 20) */
  maxDisplayIssues?: number
  /** Texts shorter than this are not worth checking (default: 2) */
  minTextLength?: number
  /** Texts longer than this are skipped (default: 10_000) */
  maxTextLength?: number
  /** Tooltip preview length (default: 60) */
  previewLength?: number
  /** UI language (default: 'en') */
  locale?: SurfaceLocale
  /** Words the user chose to ignore, case-insensitive */
  ignoredWords?: string[]
  /** First line of the tooltip (default: 'Correction Surface') */
  appTitle?: string
  /** pino level for the default logger (default: 'info') */
  logLevel?: string
  /** Use an existing pino logger instead of creating one */
  logger?: Logger
}

export interface ResolvedConfig {
  maxDisplayIssues: number
  minTextLength: number
  maxTextLength: number
  previewLength: number
  locale: SurfaceLocale
  ignoredWords: ReadonlySet<string>
  appTitle: string
}
