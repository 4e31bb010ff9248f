import { describe, it, expect } from 'vitest'
import { Pipeline, REVIEW_NOTE } from '../../src/pipeline/index.js'
import type { PipelineEvent, PipelineSettings } from '../../src/pipeline/index.js'
import { ScriptedGenerator, capabilityFailure } from '../support/fakes.js'
import { FakeGate, FakeRetriever } from '../support/pipeline-fakes.js'
import type { GenerateCall, ScriptedReply } from '../support/fakes.js'

const OVERVIEW = '# Caching\n\n## I. Eviction\nLRU details\n\n## II. Invalidation\nTTL details\n'

/** Overview, topic split and synthesis replies; drafts read "Draft for <subtopic>". */
type Override = (call: GenerateCall) => ScriptedReply | undefined | Promise<ScriptedReply | undefined>

function writer(overrides: Override = () => undefined) {
  return new ScriptedGenerator(async (call) => {
    const override = await overrides(call)
    if (override !== undefined) return override
    const operation = call.options.operation ?? ''
    if (operation === 'base_knowledge') return OVERVIEW
    if (operation === 'topic_split') return '["Eviction", "Invalidation"]'
    if (operation === 'synthesis') return '# Synthesized'
    return `Draft for ${operation.replace(/^deep_dive:/, '')}`
  })
}

const SETTINGS: PipelineSettings = {
  topK: 3,
  maxRetries: 2,
  relaxFromAttempt: 2,
  subsectionWorkers: 2,
  topicSplit: 'local',
  synthesis: 'local',
}

function deepDiveCalls(generator: ScriptedGenerator, subtopic: string): GenerateCall[] {
  return generator.calls.filter((c) => c.options.operation === `deep_dive:${subtopic}`)
}

describe('Pipeline', () => {
  it('runs every stage and synthesizes locally', async () => {
    const generator = writer()
    const retriever = new FakeRetriever()
    const events: PipelineEvent[] = []
    const pipeline = new Pipeline({ generator, retriever, gate: new FakeGate() }, SETTINGS)

    const result = await pipeline.run('Caching', { onProgress: (e) => events.push(e) })

    expect(result.stage).toBe('DONE')
    expect(result.subtopics).toEqual(['I. Eviction', 'II. Invalidation'])
    expect(result.article).toBe(
      '# Caching\n\nThis guide covers 2 key areas: I. Eviction, II. Invalidation.\n\n' +
      '## I. Eviction\n\nDraft for I. Eviction\n\n' +
      '## II. Invalidation\n\nDraft for II. Invalidation\n',
    )
    expect(result.task.sectionPath).toBe('caching')
    expect(result.task.status).toBe('succeeded')
    expect(result.task.confidence).toBe(0.9)
    expect(result.subsections.map((s) => s.task.sectionPath)).toEqual(['caching/1', 'caching/2'])
    expect(result.steps.map((s) => s.name)).toEqual(['base_knowledge', 'topic_split', 'deep_dive', 'synthesis'])
    expect(result.steps.every((s) => s.success)).toBe(true)

    expect(retriever.queries[0]).toBe('Caching')
    expect(retriever.queries.slice(1).sort()).toEqual(['Caching: I. Eviction', 'Caching: II. Invalidation'])
    expect(deepDiveCalls(generator, 'I. Eviction')[0].prompt).toContain('OVERVIEW OF THIS SECTION:\nLRU details')

    const stages = events.flatMap((e) => (e.type === 'stage' ? [e.stage] : []))
    expect(stages).toEqual(['BASE_KNOWLEDGE', 'TOPIC_SPLIT', 'DEEP_DIVE', 'SYNTHESIS', 'DONE'])
  })

  it('keeps siblings when one subsection exhausts its retries', async () => {
    const generator = writer()
    const gate = new FakeGate((topic) => (topic === 'B' ? 0.3 : 0.9))
    const pipeline = new Pipeline({ generator, retriever: new FakeRetriever(), gate }, SETTINGS)

    const result = await pipeline.run('Topic', { subtopics: ['A', 'B', 'C'] })

    expect(result.stage).toBe('DONE')
    expect(result.failedSubsections).toEqual(['B'])
    expect(result.article).toBe(
      '# Topic\n\nThis guide covers 2 key areas: A, C.\n\n## A\n\nDraft for A\n\n## C\n\nDraft for C\n',
    )

    const b = result.subsections[1]
    expect(b.task.status).toBe('failed')
    expect(b.task.attempts).toBe(3)
    expect(b.issues).toEqual(['too vague'])
    expect(b.error).toEqual({
      code: 'QUALITY_ERROR',
      message: '"B" below threshold after 3 attempt(s) (last confidence 0.30)',
    })
    expect(deepDiveCalls(generator, 'B')).toHaveLength(3)
    expect(gate.calls.filter((c) => c.topic === 'B').map((c) => c.strictness)).toEqual(['high', 'medium', 'medium'])
  })

  it('feeds the rejected draft and its issues into the retry', async () => {
    const generator = writer()
    const gate = new FakeGate((_topic, strictness) => (strictness === 'high' ? 0.3 : 0.8))
    const pipeline = new Pipeline({ generator, retriever: new FakeRetriever(), gate }, SETTINGS)

    await pipeline.run('Topic', { subtopics: ['A'] })

    const [first, second] = deepDiveCalls(generator, 'A')
    expect(first.prompt).not.toContain('A reviewer rejected your previous draft')
    expect(second.prompt).toContain('A reviewer rejected your previous draft. Rewrite it and address every point:\n- too vague')
    expect(second.prompt).toContain('PREVIOUS DRAFT:\nDraft for A')
  })

  it('marks a subsection that passes only the relaxed rubric', async () => {
    const gate = new FakeGate((_topic, strictness) => (strictness === 'high' ? 0.5 : 0.75))
    const pipeline = new Pipeline({ generator: writer(), retriever: new FakeRetriever(), gate }, SETTINGS)

    const result = await pipeline.run('T', { subtopics: ['A'] })

    expect(result.lowConfidenceCount).toBe(1)
    expect(result.subsections[0].lowConfidence).toBe(true)
    expect(result.subsections[0].task.attempts).toBe(2)
    expect(result.article).toBe(`# T\n\nThis guide covers 1 key area: A.\n\n## A\n\n${REVIEW_NOTE}\n\nDraft for A\n`)
  })

  it('fails a subsection on a draft error without retrying', async () => {
    const generator = writer((call) =>
      call.options.operation === 'deep_dive:B' ? capabilityFailure('model overloaded') : undefined,
    )
    const pipeline = new Pipeline({ generator, retriever: new FakeRetriever(), gate: new FakeGate() }, SETTINGS)

    const result = await pipeline.run('Topic', { subtopics: ['A', 'B'] })

    expect(result.stage).toBe('DONE')
    expect(result.subsections[1].task.attempts).toBe(1)
    expect(result.subsections[1].error).toEqual({ code: 'CAPABILITY_ERROR', message: 'model overloaded' })
  })

  it('synthesizes only after every subsection has settled', async () => {
    const generator = writer(async (call) => {
      if (call.options.operation !== 'deep_dive:Slow') return undefined
      await new Promise((resolve) => setTimeout(resolve, 20))
      return 'Slow draft'
    })
    const pipeline = new Pipeline(
      { generator, retriever: new FakeRetriever(), gate: new FakeGate() },
      { ...SETTINGS, synthesis: 'generate' },
    )

    const result = await pipeline.run('Topic', { subtopics: ['Slow', 'Fast'] })

    expect(result.article).toBe('# Synthesized')
    const last = generator.calls[generator.calls.length - 1]
    expect(last.options.operation).toBe('synthesis')
    expect(last.prompt).toContain('### Slow\n\nSlow draft\n\n### Fast\n\nDraft for Fast')
  })

  it('asks the splitter for subtopics in generate mode', async () => {
    const splitter = new ScriptedGenerator(() => '```json\n["Eviction", "Invalidation"]\n```')
    const generator = writer()
    const pipeline = new Pipeline(
      { generator, splitter, retriever: new FakeRetriever(), gate: new FakeGate() },
      { ...SETTINGS, topicSplit: 'generate' },
    )

    const result = await pipeline.run('Caching')

    expect(result.subtopics).toEqual(['Eviction', 'Invalidation'])
    expect(splitter.calls[0].prompt).toBe(`Analyze and split this content into sub-topics:\n\n${OVERVIEW}`)
    expect(generator.calls.some((c) => c.options.operation === 'topic_split')).toBe(false)
  })

  it('fails at TOPIC_SPLIT when no subtopics are derived', async () => {
    const splitter = new ScriptedGenerator(() => 'no list here')
    const pipeline = new Pipeline(
      { generator: writer(), splitter, retriever: new FakeRetriever(), gate: new FakeGate() },
      { ...SETTINGS, topicSplit: 'generate' },
    )

    const result = await pipeline.run('Caching')

    expect(result.stage).toBe('FAILED')
    expect(result.failedStage).toBe('TOPIC_SPLIT')
    expect(result.error).toEqual({ code: 'PARSE_ERROR', message: 'no subtopics derived (generate)' })
    expect(result.article).toBeNull()
  })

  it('fails at SYNTHESIS when no subsection succeeds', async () => {
    const gate = new FakeGate(() => 0.1)
    const pipeline = new Pipeline({ generator: writer(), retriever: new FakeRetriever(), gate }, SETTINGS)

    const result = await pipeline.run('Topic', { subtopics: ['A'] })

    expect(result.stage).toBe('FAILED')
    expect(result.failedStage).toBe('SYNTHESIS')
    expect(result.error).toEqual({ code: 'QUALITY_ERROR', message: 'no successful subsections to synthesize' })
    expect(result.failedSubsections).toEqual(['A'])
    expect(result.task.status).toBe('failed')
  })

  it('fails at BASE_KNOWLEDGE when the overview cannot be generated', async () => {
    const generator = writer((call) =>
      call.options.operation === 'base_knowledge' ? capabilityFailure('quota exceeded') : undefined,
    )
    const pipeline = new Pipeline({ generator, retriever: new FakeRetriever(), gate: new FakeGate() }, SETTINGS)

    const result = await pipeline.run('Caching')

    expect(result.failedStage).toBe('BASE_KNOWLEDGE')
    expect(result.error).toEqual({ code: 'CAPABILITY_ERROR', message: 'quota exceeded' })
    expect(generator.calls).toHaveLength(1)
  })

  it('stops before the first stage when already cancelled', async () => {
    const generator = writer()
    const controller = new AbortController()
    controller.abort()
    const pipeline = new Pipeline({ generator, retriever: new FakeRetriever(), gate: new FakeGate() }, SETTINGS)

    const result = await pipeline.run('Caching', { signal: controller.signal })

    expect(result.stage).toBe('FAILED')
    expect(result.failedStage).toBe('BASE_KNOWLEDGE')
    expect(result.error?.message).toBe('cancelled')
    expect(generator.calls).toHaveLength(0)
  })
})
