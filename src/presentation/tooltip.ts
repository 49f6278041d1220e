/**
 * Status tooltip summarizing the last correction.
 */

import { truncatePreview } from '../engine/previewBounds.js'
import { getTranslations, type SurfaceTranslations } from '../i18n.js'

export const TOOLTIP_PREVIEW_LENGTH = 60

export interface LastCorrection {
  lastOriginal?: string | null
  lastCorrected?: string | null
  lastTime?: Date | null
  provider?: string | null
  model?: string | null
}

export interface TooltipOptions {
  /** First line of the tooltip, also the whole tooltip when there is nothing to show */
  title: string
  previewLength?: number
  formatTime?: (time: Date) => string
  translations?: SurfaceTranslations
}

function defaultFormatTime(time: Date): string {
  return time.toLocaleTimeString(undefined, { hour: '2-digit', minute: '2-digit' })
}

/**
 * Lines: title, "Last: <time>", corrected preview, "via <provider> (<model>)".
 * Clauses with no value are left out.
 */
export function buildTooltip(last: LastCorrection, options: TooltipOptions): string {
  const { lastOriginal, lastCorrected, lastTime, provider, model } = last
  if (!lastOriginal || lastCorrected == null) return options.title

  const t = options.translations ?? getTranslations()
  const formatTime = options.formatTime ?? defaultFormatTime
  const parts = [options.title]

  if (lastTime) parts.push(`${t.lastCorrection}: ${formatTime(lastTime)}`)

  parts.push(truncatePreview(lastCorrected, options.previewLength ?? TOOLTIP_PREVIEW_LENGTH))

  if (provider) {
    const modelInfo = model ? ` (${model})` : ''
    parts.push(`${t.via} ${provider}${modelInfo}`)
  }

  return parts.join('\n')
}
