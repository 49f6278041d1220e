/**
 * Resolve user configuration into concrete values.
 * Missing fields take their defaults; out-of-range numbers are replaced by
 * the default and reported through the logger.
 */

import type { Logger } from 'pino'
import type { CorrectionSurfaceConfig, ResolvedConfig } from './types.js'
import { LOG_PREFIX } from './logger.js'

export const DEFAULTS = {
  maxDisplayIssues: 20,
  minTextLength: 2,
  maxTextLength: 10_000,
  previewLength: 60,
  locale: 'en',
  appTitle: 'Correction Surface',
} as const satisfies Omit<ResolvedConfig, 'ignoredWords'>

type NumericKey = 'maxDisplayIssues' | 'minTextLength' | 'maxTextLength' | 'previewLength'

function resolveNumber(
  config: CorrectionSurfaceConfig,
  key: NumericKey,
  logger: Logger,
): number {
  const value = config[key]
  if (value === undefined) return DEFAULTS[key]
  if (!Number.isFinite(value) || value < 0) {
    logger.warn(`${LOG_PREFIX} Invalid ${key} (${value}), using ${DEFAULTS[key]}`)
    return DEFAULTS[key]
  }
  return Math.floor(value)
}

export function resolveConfig(config: CorrectionSurfaceConfig, logger: Logger): ResolvedConfig {
  let minTextLength = resolveNumber(config, 'minTextLength', logger)
  let maxTextLength = resolveNumber(config, 'maxTextLength', logger)
  if (minTextLength > maxTextLength) {
    logger.warn(
      `${LOG_PREFIX} minTextLength (${minTextLength}) exceeds maxTextLength (${maxTextLength}), using defaults`,
    )
    minTextLength = DEFAULTS.minTextLength
    maxTextLength = DEFAULTS.maxTextLength
  }

  return {
    maxDisplayIssues: resolveNumber(config, 'maxDisplayIssues', logger),
    minTextLength,
    maxTextLength,
    previewLength: resolveNumber(config, 'previewLength', logger),
    locale: config.locale ?? DEFAULTS.locale,
    ignoredWords: new Set((config.ignoredWords || []).map((w) => w.toLowerCase())),
    appTitle: config.appTitle || DEFAULTS.appTitle,
  }
}
