import { describe, it, expect } from 'vitest'
import { transformQuestion, transformBlindspot, transformWikiSection } from '../../src/sync/transforms.js'
import { computeContentHash } from '../../src/common/index.js'

describe('transformQuestion', () => {
  it('renders the question document', () => {
    const result = transformQuestion('questions', {
      id: 'Q-WAL',
      question: 'What is a write-ahead log?',
      answer: 'A log of changes written before data pages.',
      level: 'senior',
      topics: ['storage', 'durability'],
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const content = `# Interview Question

**Level:** senior
**Topics:** storage, durability

## Question

What is a write-ahead log?

## Answer

A log of changes written before data pages.
`
    expect(result.value).toEqual({
      docId: 'questions:q-wal',
      source: 'questions',
      title: 'What is a write-ahead log?',
      content,
      contentHash: computeContentHash(content),
      charCount: content.length,
      metadata: { level: 'senior', topics: 'storage, durability' },
    })
  })

  it('truncates long titles', () => {
    const question = `${'a'.repeat(100)}?`
    const result = transformQuestion('questions', { id: 7, question })
    if (!result.ok) throw result.error.error
    expect(result.value.title).toBe(`${'a'.repeat(80)}...`)
    expect(result.value.docId).toBe('questions:7')
    expect(result.value.metadata).toEqual({})
  })

  it('keeps the doc id of an entry that fails validation', () => {
    const result = transformQuestion('questions', { id: 'q-1', answer: 'no question' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.docId).toBe('questions:q-1')
    expect(result.error.error.code).toBe('PARSE_ERROR')
    expect(result.error.error.message).toBe('questions: question: Required')
  })

  it('has no doc id when the entry has no id', () => {
    const result = transformQuestion('questions', 'just a string')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.docId).toBeUndefined()
  })
})

describe('transformBlindspot', () => {
  it('renders lists and placeholders', () => {
    const result = transformBlindspot('blindspots', {
      id: 'b-1',
      question: 'Why not retry forever?',
      answer: 'Retry storms.',
      category: 'reliability',
      difficulty: 'hard',
      masteryLevel: 'staff',
      whyAsked: 'Checks failure thinking.',
      followUps: ['What is jitter?'],
    })
    if (!result.ok) throw result.error.error
    expect(result.value.content).toContain('## Follow-up Questions\n\n- What is jitter?\n')
    expect(result.value.content).toContain('## Red Flags (Poor Answers)\n\nNone\n')
    expect(result.value.metadata).toEqual({ category: 'reliability', difficulty: 'hard' })
  })
})

describe('transformWikiSection', () => {
  it('flattens groups and entries into one document per tool', () => {
    const results = transformWikiSection('wiki', {
      provider: 'AWS',
      groups: [
        { name: 'Storage', entries: [{ tool: 'S3', summary: 'Objects', adoption: 'High' }] },
        { name: 'Queues', entries: [{ tool: 'SQS' }, { summary: 'no tool' }] },
      ],
    })
    expect(results).toHaveLength(3)
    const [s3, sqs, broken] = results
    if (!s3.ok || !sqs.ok) throw new Error('expected documents')
    expect(s3.value.docId).toBe('wiki:aws-s3')
    expect(s3.value.title).toBe('AWS S3')
    expect(s3.value.metadata).toEqual({ provider: 'AWS', group: 'Storage' })
    expect(s3.value.content).toContain('**Cost Tier:** N/A')
    expect(sqs.value.content).toContain('No specific guidance provided.')
    expect(broken.ok).toBe(false)
    if (!broken.ok) expect(broken.error.error.message).toBe('wiki: AWS/Queues: tool: Required')
  })
})
