import { describe, it, expect } from 'vitest'
import { createCorrectionSurface } from '../surface.js'
import { resolveConfig, DEFAULTS } from '../config.js'
import { captureLogger, makeIssue } from './helpers.js'

// --- Config ---

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const { logger, messages } = captureLogger()
    const config = resolveConfig({}, logger)
    expect(config).toEqual({
      maxDisplayIssues: 20,
      minTextLength: 2,
      maxTextLength: 10_000,
      previewLength: 60,
      locale: 'en',
      ignoredWords: new Set(),
      appTitle: 'Correction Surface',
    })
    expect(messages()).toEqual([])
  })

  it('should replace invalid numbers with defaults and warn', () => {
    const { logger, messages } = captureLogger()
    const config = resolveConfig({ maxDisplayIssues: -1, previewLength: Number.NaN }, logger)
    expect(config.maxDisplayIssues).toBe(DEFAULTS.maxDisplayIssues)
    expect(config.previewLength).toBe(DEFAULTS.previewLength)
    expect(messages()).toEqual([
      '[correction-surface] Invalid maxDisplayIssues (-1), using 20',
      '[correction-surface] Invalid previewLength (NaN), using 60',
    ])
  })

  it('should reset inverted text bounds', () => {
    const { logger, messages } = captureLogger()
    const config = resolveConfig({ minTextLength: 50, maxTextLength: 10 }, logger)
    expect(config.minTextLength).toBe(2)
    expect(config.maxTextLength).toBe(10_000)
    expect(messages()).toEqual([
      '[correction-surface] minTextLength (50) exceeds maxTextLength (10), using defaults',
    ])
  })

  it('should floor numbers and lowercase ignored words', () => {
    const { logger } = captureLogger()
    const config = resolveConfig({ maxDisplayIssues: 7.9, ignoredWords: ['Naresh', 'TEH'] }, logger)
    expect(config.maxDisplayIssues).toBe(7)
    expect([...config.ignoredWords]).toEqual(['naresh', 'teh'])
  })
})

// --- Surface ---

describe('createCorrectionSurface', () => {
  const text = 'I met Naresh and teh API team'
  const primary = [makeIssue('teh', 17, 3, 'spelling', ['the'])]
  const secondary = [
    makeIssue('Naresh', 6, 6, 'spelling', ['Marsh']),
    makeIssue('teh', 17, 3, 'spelling', ['ten']),
    makeIssue('API', 21, 3, 'spelling', ['Ape']),
    makeIssue('met', 2, 3, 'grammar', ['meet']),
  ]

  it('should locate the line under the cursor', () => {
    const surface = createCorrectionSurface({ logger: captureLogger().logger })
    expect(surface.locateLine('one\ntwo', 5)).toEqual({
      found: true,
      lineText: 'two',
      lineRange: { start: 4, length: 3 },
    })
  })

  it('should merge, filter, sort and cap display issues', () => {
    const surface = createCorrectionSurface({ logger: captureLogger().logger })
    expect(surface.displayIssues(primary, secondary, text)).toEqual([secondary[3], primary[0]])
  })

  it('should apply ignored words and the display cap', () => {
    const ignoring = createCorrectionSurface({ ignoredWords: ['MET'], logger: captureLogger().logger })
    expect(ignoring.displayIssues(primary, secondary, text)).toEqual([primary[0]])

    const capped = createCorrectionSurface({ maxDisplayIssues: 1, logger: captureLogger().logger })
    expect(capped.displayIssues(primary, secondary, text)).toEqual([secondary[3]])
  })

  it('should log dropped secondary issues at debug level', () => {
    const { logger, messages } = captureLogger('debug')
    const surface = createCorrectionSurface({ logger })
    surface.displayIssues(primary, secondary, text)
    expect(messages()).toEqual([
      '[correction-surface] Dropped 1 secondary issue(s) overlapping primary issues: "teh"@17',
    ])
  })

  it('should stay quiet above debug level', () => {
    const { logger, messages } = captureLogger('info')
    createCorrectionSurface({ logger }).displayIssues(primary, secondary, text)
    expect(messages()).toEqual([])
  })

  it('should bound previews and check eligibility from config', () => {
    const surface = createCorrectionSurface({ previewLength: 10, minTextLength: 3, logger: captureLogger().logger })
    expect(surface.preview('hello\nwonderful world')).toBe('hello won…')
    expect(surface.shouldCheck('ab')).toBe(false)
    expect(surface.shouldCheck('abc')).toBe(true)
  })

  it('should summarize in the configured locale', () => {
    const surface = createCorrectionSurface({ locale: 'fr', logger: captureLogger().logger })
    expect(surface.summary([])).toBe('Aucun problème détecté')
  })

  it('should build the tooltip with the app title', () => {
    const surface = createCorrectionSurface({ logger: captureLogger().logger })
    expect(surface.tooltip({})).toBe('Correction Surface')
    expect(surface.tooltip({ lastOriginal: 'teh', lastCorrected: 'the', lastTime: new Date(0) }, () => '09:30'))
      .toBe('Correction Surface\nLast: 09:30\nthe')
  })
})
