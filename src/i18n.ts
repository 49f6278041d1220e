/**
 * Correction surface — i18n translations (EN/FR).
 */

export type SurfaceLocale = 'en' | 'fr'

export interface SurfaceTranslations {
  // Summary
  noIssues: string
  spellingIssues: (count: number) => string
  grammarIssues: (count: number) => string
  styleSuggestions: (count: number) => string

  // Issue labels
  spelling: string
  grammar: string
  style: string

  // Tooltip
  lastCorrection: string
  via: string

  // Writing coach panel
  emptyStrengths: string
  emptyImprovements: string
  reviewed: (sampleCount: number) => string
}

const en: SurfaceTranslations = {
  noIssues: 'No issues found',
  spellingIssues: (count) => `${count} spelling issue${count > 1 ? 's' : ''}`,
  grammarIssues: (count) => `${count} grammar issue${count > 1 ? 's' : ''}`,
  styleSuggestions: (count) => `${count} style suggestion${count > 1 ? 's' : ''}`,

  spelling: 'Spelling',
  grammar: 'Grammar',
  style: 'Style',

  lastCorrection: 'Last',
  via: 'via',

  emptyStrengths: 'No recurring strengths detected yet.',
  emptyImprovements: 'No specific improvements suggested yet.',
  reviewed: (sampleCount) => `Reviewed ${sampleCount} writing sample(s).`,
}

const fr: SurfaceTranslations = {
  noIssues: 'Aucun problème détecté',
  spellingIssues: (count) => `${count} faute${count > 1 ? 's' : ''} d'orthographe`,
  grammarIssues: (count) => `${count} problème${count > 1 ? 's' : ''} de grammaire`,
  styleSuggestions: (count) => `${count} suggestion${count > 1 ? 's' : ''} de style`,

  spelling: 'Orthographe',
  grammar: 'Grammaire',
  style: 'Style',

  lastCorrection: 'Dernière',
  via: 'via',

  emptyStrengths: 'Aucun point fort récurrent détecté pour le moment.',
  emptyImprovements: 'Aucune amélioration particulière suggérée pour le moment.',
  reviewed: (sampleCount) => `${sampleCount} texte(s) analysé(s).`,
}

const translations: Record<SurfaceLocale, SurfaceTranslations> = { en, fr }

export function getTranslations(locale: SurfaceLocale = 'en'): SurfaceTranslations {
  return translations[locale] || translations.en
}
