import { describe, it, expect } from 'vitest'
import { QualityGate, EVALUATOR_SYSTEM_PROMPT } from '../../src/quality/index.js'
import type { ContextBundle } from '../../src/retrieval/index.js'
import { ScriptedGenerator, capabilityFailure } from '../support/fakes.js'

const bundle: ContextBundle = {
  query: 'Caching',
  mode: 'rag',
  retrievedDocs: [
    {
      docId: 'kb:cache',
      source: 'kb',
      title: 'Cache',
      content: 'LRU evicts the least recently used entry.',
      contentHash: 'h',
      indexedAt: '2026-01-01T00:00:00.000Z',
      charCount: 41,
      metadata: {},
      score: 0.9,
      truncated: false,
    },
  ],
  totalChars: 41,
  truncated: false,
}

describe('QualityGate', () => {
  it('passes a draft at or above the threshold', async () => {
    const evaluator = new ScriptedGenerator(() => '{"confidence": 0.7, "issues": []}')
    const gate = new QualityGate(evaluator, { threshold: 0.7 })

    const assessment = await gate.evaluate('draft text', bundle, 'Caching')
    expect(assessment).toEqual({ confidence: 0.7, issues: [], passed: true, status: 'json', strictness: 'high' })
  })

  it('sends the draft with the rendered context', async () => {
    const evaluator = new ScriptedGenerator(() => '{"confidence": 0.9}')
    const gate = new QualityGate(evaluator, { threshold: 0.7 })

    await gate.evaluate('draft text', bundle, 'Caching', { strictness: 'medium' })
    const call = evaluator.calls[0]
    expect(call.prompt).toContain('<draft>\ndraft text\n</draft>')
    expect(call.prompt).toContain('Review as a senior technical reviewer.')
    expect(call.context).toBe('--- Document: kb:cache ---\nLRU evicts the least recently used entry.')
    expect(call.options.systemPrompt).toBe(EVALUATOR_SYSTEM_PROMPT)
    expect(call.options.operation).toBe('evaluate:Caching')
  })

  it('fails a draft below the threshold and keeps its issues', async () => {
    const gate = new QualityGate(
      new ScriptedGenerator(() => '{"confidence": 0.4, "issues": ["Unsupported latency figure"]}'),
      { threshold: 0.7 },
    )

    const assessment = await gate.evaluate('draft', bundle, 'Caching', { strictness: 'low' })
    expect(assessment.passed).toBe(false)
    expect(assessment.issues).toEqual(['Unsupported latency figure'])
    expect(assessment.strictness).toBe('low')
  })

  it('never passes an unparsable assessment', async () => {
    const gate = new QualityGate(new ScriptedGenerator(() => 'Great work!'), { threshold: 0.5 })

    const assessment = await gate.evaluate('draft', bundle, 'Caching')
    expect(assessment.confidence).toBe(0)
    expect(assessment.status).toBe('unparsable')
    expect(assessment.passed).toBe(false)
  })

  it('scores a failed evaluation call as zero', async () => {
    const gate = new QualityGate(new ScriptedGenerator(() => capabilityFailure('rate limited')), { threshold: 0.7 })

    const assessment = await gate.evaluate('draft', bundle, 'Caching')
    expect(assessment).toEqual({
      confidence: 0,
      issues: ['evaluation failed: rate limited'],
      passed: false,
      status: 'evaluation_failed',
      strictness: 'high',
    })
  })
})
