import { describe, it, expect } from 'vitest'
import { cappedItems, truncatePreview } from '../engine/previewBounds.js'

describe('cappedItems', () => {
  it('should return all items when under the limit', () => {
    const items = ['A', 'B', 'C']
    expect(cappedItems(items)).toEqual(items)
  })

  it('should cap at 5 by default', () => {
    expect(cappedItems(['1', '2', '3', '4', '5', '6', '7'])).toEqual(['1', '2', '3', '4', '5'])
  })

  it('should return empty for empty input', () => {
    expect(cappedItems([])).toEqual([])
  })

  it('should return empty for a zero or negative limit', () => {
    expect(cappedItems(['A', 'B'], 0)).toEqual([])
    expect(cappedItems(['A'], -3)).toEqual([])
  })

  it('should respect a custom limit', () => {
    expect(cappedItems(['A', 'B', 'C', 'D'], 2)).toEqual(['A', 'B'])
  })

  it('should return a prefix of length min(len, max(limit, 0))', () => {
    const items = [1, 2, 3, 4]
    for (let limit = -2; limit <= 6; limit++) {
      const result = cappedItems(items, limit)
      expect(result).toHaveLength(Math.min(items.length, Math.max(limit, 0)))
      expect(result).toEqual(items.slice(0, result.length))
    }
  })

  it('should not mutate the input', () => {
    const items = ['A', 'B', 'C']
    cappedItems(items, 1)
    expect(items).toEqual(['A', 'B', 'C'])
  })
})

describe('truncatePreview', () => {
  it('should return short text unchanged', () => {
    expect(truncatePreview('hello', 20)).toBe('hello')
  })

  it('should cut long text to maxLength with an ellipsis', () => {
    const result = truncatePreview('a'.repeat(100), 20)
    expect(result).toHaveLength(20)
    expect(result).toBe(`${'a'.repeat(19)}…`)
  })

  it('should collapse newlines into spaces', () => {
    expect(truncatePreview('hello\nworld', 60)).toBe('hello world')
  })

  it('should collapse each terminator into one space', () => {
    expect(truncatePreview('a\r\nb\rc\n\nd', 60)).toBe('a b c  d')
  })

  it('should trim surrounding whitespace', () => {
    expect(truncatePreview('  hello  ', 60)).toBe('hello')
    expect(truncatePreview('\nhello\n', 60)).toBe('hello')
  })

  it('should keep text of exactly maxLength', () => {
    expect(truncatePreview('hello', 5)).toBe('hello')
    expect(truncatePreview('hello!', 5)).toBe('hell…')
  })

  it('should handle tiny limits', () => {
    expect(truncatePreview('ab', 1)).toBe('…')
    expect(truncatePreview('ab', 0)).toBe('')
    expect(truncatePreview('', 0)).toBe('')
  })

  it('should count and cut in code points', () => {
    const result = truncatePreview('ab\u{1F600}cd', 4)
    expect(result).toBe('ab\u{1F600}…')
    expect(Array.from(result)).toHaveLength(4)
    expect(truncatePreview('ab\u{1F600}', 3)).toBe('ab\u{1F600}')
  })

  it('should never exceed maxLength and hit it exactly when cutting', () => {
    const samples = ['short', 'a somewhat longer line\nwith a break', '   padded   ', '']
    for (const sample of samples) {
      const normalized = sample.replace(/\n/g, ' ').trim()
      for (let max = 0; max <= 40; max++) {
        const result = truncatePreview(sample, max)
        expect(result.length).toBeLessThanOrEqual(max)
        if (normalized.length > max) expect(result).toHaveLength(max)
      }
    }
  })
})
