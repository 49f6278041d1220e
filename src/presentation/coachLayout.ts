/**
 * Writing coach panel: layout constants and list helpers.
 * Two panels (strengths, improvements) sit side by side in the accessory view.
 */

import { cappedItems } from '../engine/previewBounds.js'
import { getTranslations, type SurfaceTranslations } from '../i18n.js'

export const COACH_LAYOUT = {
  accessoryWidth: 560,
  panelSpacing: 16,
  panelInset: 16,
  cornerRadius: 10,
  borderAlpha: 0.4,
  backgroundAlpha: 0.05,
  headerFontSize: 14,
  itemFontSize: 13,
  strengthPrefix: '✓ ',
  improvementPrefix: '→ ',
  maxItems: 5,
} as const

/** Usable text width inside one of the two panels */
export function panelContentWidth(): number {
  const panelWidth = (COACH_LAYOUT.accessoryWidth - COACH_LAYOUT.panelSpacing) / 2
  return panelWidth - COACH_LAYOUT.panelInset * 2
}

export function reviewedText(sampleCount: number, t: SurfaceTranslations = getTranslations()): string {
  return t.reviewed(sampleCount)
}

export interface CoachPanelLines {
  strengths: string[]
  improvements: string[]
}

/**
 * Prefixed, capped lines for both panels, with a fallback line for an empty list.
 */
export function coachPanelLines(
  strengths: readonly string[],
  improvements: readonly string[],
  t: SurfaceTranslations = getTranslations(),
): CoachPanelLines {
  const strengthItems = cappedItems(strengths, COACH_LAYOUT.maxItems)
  const improvementItems = cappedItems(improvements, COACH_LAYOUT.maxItems)
  return {
    strengths: strengthItems.length > 0
      ? strengthItems.map((s) => COACH_LAYOUT.strengthPrefix + s)
      : [t.emptyStrengths],
    improvements: improvementItems.length > 0
      ? improvementItems.map((s) => COACH_LAYOUT.improvementPrefix + s)
      : [t.emptyImprovements],
  }
}
