/**
 * Correction surface.
 *
 * Binds a resolved configuration and a logger to the line, issue and
 * preview helpers, for hosts that want a single entry point:
 *
 *   import { createCorrectionSurface } from 'correction-surface'
 *
 *   const surface = createCorrectionSurface({ maxDisplayIssues: 10 })
 *   const line = surface.locateLine(text, cursor)
 *   const issues = surface.displayIssues(primaryIssues, secondaryIssues, text)
 */

import type { Logger } from 'pino'
import type { CorrectionSurfaceConfig, Issue, LineLookup, ResolvedConfig } from './types.js'
import { resolveConfig } from './config.js'
import { createLogger, LOG_PREFIX } from './logger.js'
import { getTranslations } from './i18n.js'
import { locateLine } from './engine/lineLocator.js'
import { partitionSecondary } from './engine/issueMerger.js'
import { prepareDisplayIssues } from './engine/display.js'
import { truncatePreview } from './engine/previewBounds.js'
import { shouldCheck, summaryText } from './engine/filters.js'
import { buildTooltip, type LastCorrection } from './presentation/tooltip.js'

export interface CorrectionSurface {
  readonly config: ResolvedConfig
  readonly logger: Logger
  locateLine(text: string, cursor: number): LineLookup
  displayIssues(primary: readonly Issue[], secondary: readonly Issue[], text: string): Issue[]
  shouldCheck(text: string): boolean
  summary(issues: readonly Issue[]): string
  preview(text: string): string
  tooltip(last: LastCorrection, formatTime?: (time: Date) => string): string
}

export function createCorrectionSurface(options: CorrectionSurfaceConfig = {}): CorrectionSurface {
  const logger = options.logger ?? createLogger(options.logLevel)
  const config = resolveConfig(options, logger)
  const t = getTranslations(config.locale)

  return {
    config,
    logger,

    locateLine: (text, cursor) => locateLine(text, cursor),

    displayIssues(primary, secondary, text) {
      if (logger.isLevelEnabled('debug')) {
        const { dropped } = partitionSecondary(primary, secondary)
        if (dropped.length > 0) {
          logger.debug(
            `${LOG_PREFIX} Dropped ${dropped.length} secondary issue(s) overlapping primary issues: ${dropped
              .map((i) => `"${i.word}"@${i.range.start}`)
              .join(', ')}`,
          )
        }
      }
      return prepareDisplayIssues(primary, secondary, text, {
        maxDisplayIssues: config.maxDisplayIssues,
        ignoredWords: config.ignoredWords,
      })
    },

    shouldCheck: (text) => shouldCheck(text, config),

    summary: (issues) => summaryText(issues, t),

    preview: (text) => truncatePreview(text, config.previewLength),

    tooltip: (last, formatTime) =>
      buildTooltip(last, {
        title: config.appTitle,
        previewLength: config.previewLength,
        formatTime,
        translations: t,
      }),
  }
}
