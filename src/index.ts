// Entry: engine + presentation helpers + types
export { createCorrectionSurface } from './surface.js'
export type { CorrectionSurface } from './surface.js'
export type {
  CorrectionSurfaceConfig,
  ResolvedConfig,
  Issue,
  IssueKind,
  TextRange,
  LineResult,
  LineLookup,
  MergeOptions,
} from './types.js'
export { resolveConfig, DEFAULTS } from './config.js'
export { createLogger, LOG_PREFIX } from './logger.js'
export { textRange, rangeEnd, rangesOverlap, rangeContains } from './engine/textRange.js'
export { locateLine } from './engine/lineLocator.js'
export { mergeIssues, partitionSecondary } from './engine/issueMerger.js'
export type { SecondaryPartition } from './engine/issueMerger.js'
export { cappedItems, truncatePreview } from './engine/previewBounds.js'
export { prepareDisplayIssues } from './engine/display.js'
export type { DisplayOptions } from './engine/display.js'
export {
  filterIgnoredWords,
  filterLikelyNames,
  filterAcronyms,
  isLikelyProperNoun,
  isLikelyAcronym,
  shouldCheck,
  issuesByKind,
  summaryText,
  issueDescription,
  iconName,
} from './engine/filters.js'
export type { TextBounds } from './engine/filters.js'
export { issuesFromLanguageTool, kindForMatch } from './engine/languagetool.js'
export type { LTMatch } from './engine/languagetool.js'
export {
  KEY_OPTIONS,
  DEFAULT_KEY_CODE,
  keyTitle,
  makeModifiers,
  splitModifiers,
  hotkeyDisplayString,
} from './presentation/hotkeys.js'
export type { HotkeyKeyOption, Modifiers } from './presentation/hotkeys.js'
export { buildTooltip, TOOLTIP_PREVIEW_LENGTH } from './presentation/tooltip.js'
export type { LastCorrection, TooltipOptions } from './presentation/tooltip.js'
export { COACH_LAYOUT, panelContentWidth, reviewedText, coachPanelLines } from './presentation/coachLayout.js'
export type { CoachPanelLines } from './presentation/coachLayout.js'
export { getTranslations } from './i18n.js'
export type { SurfaceLocale, SurfaceTranslations } from './i18n.js'
