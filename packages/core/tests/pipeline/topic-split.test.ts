import { describe, it, expect } from 'vitest'
import { normalizeTopics, parseTopicList, splitByRomanNumerals, synthesizeLocally, REVIEW_NOTE } from '../../src/pipeline/index.js'

describe('splitByRomanNumerals', () => {
  it('splits on Roman numeral headings and keeps their bodies', () => {
    const overview = '# Caching\n\nIntro.\n\n## I. Eviction\nLRU and LFU.\n\n## II. Invalidation\nTTL and events.\n'
    const split = splitByRomanNumerals(overview)
    expect(split.topics).toEqual(['I. Eviction', 'II. Invalidation'])
    expect(split.sections.get('I. Eviction')).toBe('LRU and LFU.')
    expect(split.sections.get('II. Invalidation')).toBe('TTL and events.')
  })

  it('falls back to plain second-level headings', () => {
    const split = splitByRomanNumerals('## Eviction\nA\n## Invalidation\nB')
    expect(split.topics).toEqual(['Eviction', 'Invalidation'])
  })

  it('keeps the first of duplicate headings', () => {
    const split = splitByRomanNumerals('## I. Scope\nfirst\n## I. Scope\nsecond')
    expect(split.topics).toEqual(['I. Scope'])
    expect(split.sections.get('I. Scope')).toBe('first')
  })

  it('returns nothing for unstructured text', () => {
    expect(splitByRomanNumerals('Just a paragraph.').topics).toEqual([])
  })
})

describe('normalizeTopics', () => {
  it('collapses whitespace and drops empties and case-insensitive duplicates', () => {
    expect(normalizeTopics(['  Write  paths ', '', 'write paths', 'Read paths'])).toEqual(['Write paths', 'Read paths'])
  })
})

describe('parseTopicList', () => {
  it('parses a raw JSON array', () => {
    expect(parseTopicList('["Eviction", "Invalidation"]')).toEqual(['Eviction', 'Invalidation'])
  })

  it('parses a fenced JSON array', () => {
    expect(parseTopicList('Sure:\n```json\n["Eviction", 2]\n```')).toEqual(['Eviction', '2'])
  })

  it('falls back to list items without bold markers', () => {
    expect(parseTopicList('Topics:\n1. **Eviction**\n- Invalidation\nnot an item')).toEqual(['Eviction', 'Invalidation'])
  })

  it('returns nothing when no list is present', () => {
    expect(parseTopicList('no list here')).toEqual([])
  })
})

describe('synthesizeLocally', () => {
  it('joins sections in order with a review note on low-confidence ones', () => {
    const article = synthesizeLocally('Caching', [
      { title: 'Eviction', content: 'LRU.\n', lowConfidence: false },
      { title: 'Invalidation', content: 'TTL.', lowConfidence: true },
    ])
    expect(article).toBe(
      '# Caching\n\n' +
      'This guide covers 2 key areas: Eviction, Invalidation.\n\n' +
      '## Eviction\n\nLRU.\n\n' +
      `## Invalidation\n\n${REVIEW_NOTE}\n\nTTL.\n`,
    )
  })

  it('uses the singular for one section', () => {
    expect(synthesizeLocally('T', [{ title: 'A', content: 'a', lowConfidence: false }])).toBe(
      '# T\n\nThis guide covers 1 key area: A.\n\n## A\n\na\n',
    )
  })
})
