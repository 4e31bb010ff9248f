import { describe, it, expect } from 'vitest'
import { computeContentHash, titleToSlug } from '../../src/common/index.js'

describe('computeContentHash', () => {
  it('is a stable sha256 hex digest', () => {
    expect(computeContentHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855')
    expect(computeContentHash('abc')).toBe(computeContentHash('abc'))
  })

  it('changes on a single character edit', () => {
    expect(computeContentHash('retry budget')).not.toBe(computeContentHash('retry budgeT'))
  })
})

describe('titleToSlug', () => {
  it('lowercases and hyphenates', () => {
    expect(titleToSlug('Event Sourcing & CQRS')).toBe('event-sourcing-cqrs')
  })

  it('collapses separators and trims hyphens', () => {
    expect(titleToSlug('  --Rate   Limiting--  ')).toBe('rate-limiting')
  })

  it('returns empty for titles with no slug characters', () => {
    expect(titleToSlug('!!!')).toBe('')
  })
})
