/**
 * Pipeline: BASE_KNOWLEDGE → TOPIC_SPLIT → DEEP_DIVE → SYNTHESIS → DONE for one topic.
 *
 * Any stage can move the run to FAILED. Deep dive fans subsections out over a
 * bounded pool; each subsection retrieves its own context, drafts, and passes
 * through the quality gate, retrying with the gate's issues as guidance. A
 * failed subsection never aborts its siblings, and synthesis starts only after
 * every subsection has settled.
 */

import { v4 as uuidv4 } from 'uuid'
import { KBForgeError, errorMessage, mapSettled, titleToSlug } from '../common/index.js'
import type { TextGenerator } from '../agents/index.js'
import type { AppConfig } from '../config/index.js'
import type { DraftEvaluator, Strictness } from '../quality/index.js'
import { renderContext } from '../retrieval/index.js'
import type { ContextBundle, Retriever } from '../retrieval/index.js'
import {
  SPLIT_SYSTEM_PROMPT,
  WRITER_SYSTEM_PROMPT,
  baseKnowledgePrompt,
  deepDivePrompt,
  synthesisPrompt,
  topicSplitPrompt,
} from './prompts.js'
import type { SynthesisSection } from './prompts.js'
import { normalizeTopics, parseTopicList, splitByRomanNumerals } from './topic-split.js'
import { synthesizeLocally } from './synthesis.js'
import type {
  GenerationTask,
  PipelineEvent,
  PipelineResult,
  PipelineStage,
  PipelineStep,
  ProgressListener,
  StepName,
  SubsectionResult,
  WorkStage,
} from './schemas.js'

export interface PipelineDependencies {
  generator: TextGenerator
  retriever: Retriever
  gate: DraftEvaluator
  /** Used for topic splitting in `generate` mode; defaults to the generator. */
  splitter?: TextGenerator
}

export interface PipelineSettings {
  topK: number
  /** Regenerations after the first draft. */
  maxRetries: number
  /** Attempt number from which the rubric relaxes to medium strictness. */
  relaxFromAttempt: number
  subsectionWorkers: number
  topicSplit: 'generate' | 'local'
  synthesis: 'local' | 'generate'
}

export function pipelineSettingsFromConfig(config: AppConfig): PipelineSettings {
  return {
    topK: config.retrieval.topK,
    maxRetries: config.quality.maxRetries,
    relaxFromAttempt: config.quality.relaxFromAttempt,
    subsectionWorkers: config.pipeline.subsectionWorkers,
    topicSplit: config.pipeline.topicSplit,
    synthesis: config.pipeline.synthesis,
  }
}

export interface PipelineRunOptions {
  /** Externally supplied structure; skips deriving subtopics from the overview. */
  subtopics?: string[]
  sectionPath?: string
  /**
   * Checked before each stage and each subsection attempt. Capability calls
   * already in flight run to completion.
   */
  signal?: AbortSignal
  onProgress?: ProgressListener
}

interface RunContext {
  runId: string
  topic: string
  task: GenerationTask
  steps: PipelineStep[]
  signal?: AbortSignal
  emit: (event: PipelineEvent) => void
}

class StageFailure extends Error {
  constructor(readonly stage: WorkStage, readonly error: KBForgeError) {
    super(error.message)
    this.name = 'StageFailure'
  }
}

function beginStep(ctx: RunContext, name: StepName) {
  const startedAt = new Date()
  return (success: boolean, metadata: PipelineStep['metadata'] = {}, error?: string): void => {
    ctx.steps.push({
      name,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
      success,
      ...(error !== undefined ? { error } : {}),
      metadata,
    })
  }
}

function mean(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((a, b) => a + b, 0) / values.length
}

export class Pipeline {
  private readonly splitter: TextGenerator

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly settings: PipelineSettings,
  ) {
    this.splitter = deps.splitter ?? deps.generator
  }

  async run(topic: string, options: PipelineRunOptions = {}): Promise<PipelineResult> {
    const startTime = Date.now()
    const ctx: RunContext = {
      runId: uuidv4(),
      topic,
      task: {
        topic,
        sectionPath: options.sectionPath ?? titleToSlug(topic),
        status: 'in_progress',
        attempts: 1,
        confidence: null,
      },
      steps: [],
      signal: options.signal,
      emit: (event) => options.onProgress?.(event),
    }
    let subtopics: string[] = []
    let subsections: SubsectionResult[] = []
    let stage: WorkStage = 'BASE_KNOWLEDGE'

    const result = (
      terminal: 'DONE' | 'FAILED',
      article: string | null,
      failure?: { stage: WorkStage; error: KBForgeError },
    ): PipelineResult => {
      this.enter(ctx, terminal)
      const succeeded = subsections.filter((s) => s.task.status === 'succeeded')
      ctx.task.status = terminal === 'DONE' ? 'succeeded' : 'failed'
      ctx.task.confidence = mean(succeeded.flatMap((s) => (s.task.confidence === null ? [] : [s.task.confidence])))
      const totalDurationMs = Date.now() - startTime
      if (failure) {
        console.error(`[pipeline] ${ctx.runId} "${topic}" FAILED at ${failure.stage}: ${failure.error.message}`)
      } else {
        console.log(`[pipeline] ${ctx.runId} "${topic}" DONE in ${totalDurationMs}ms`)
      }
      return {
        runId: ctx.runId,
        topic,
        stage: terminal,
        ...(failure ? { failedStage: failure.stage, error: { code: failure.error.code, message: failure.error.message } } : {}),
        task: ctx.task,
        subtopics,
        subsections,
        article,
        lowConfidenceCount: succeeded.filter((s) => s.lowConfidence).length,
        failedSubsections: subsections.filter((s) => s.task.status === 'failed').map((s) => s.title),
        steps: ctx.steps,
        totalDurationMs,
      }
    }

    try {
      console.log(`[pipeline] ${ctx.runId} starting "${topic}"`)

      stage = 'BASE_KNOWLEDGE'
      this.enter(ctx, stage)
      const base = await this.baseKnowledge(ctx)

      stage = 'TOPIC_SPLIT'
      this.enter(ctx, stage)
      const split = await this.topicSplit(ctx, base.overview, options.subtopics)
      subtopics = split.subtopics

      stage = 'DEEP_DIVE'
      this.enter(ctx, stage)
      subsections = await this.deepDive(ctx, subtopics, split.excerpts)

      stage = 'SYNTHESIS'
      this.enter(ctx, stage)
      const article = await this.synthesize(ctx, subsections)
      return result('DONE', article)
    } catch (e) {
      if (e instanceof StageFailure) {
        return result('FAILED', null, { stage: e.stage, error: e.error })
      }
      const error = e instanceof KBForgeError ? e : KBForgeError.internal(errorMessage(e))
      return result('FAILED', null, { stage, error })
    }
  }

  private enter(ctx: RunContext, stage: PipelineStage): void {
    ctx.emit({ type: 'stage', runId: ctx.runId, topic: ctx.topic, stage })
  }

  private checkCancelled(ctx: RunContext, stage: WorkStage): void {
    if (ctx.signal?.aborted) {
      throw new StageFailure(stage, KBForgeError.capability('cancelled'))
    }
  }

  private async retrieve(ctx: RunContext, query: string): Promise<ContextBundle> {
    const bundle = await this.deps.retriever.retrieve(query, this.settings.topK)
    ctx.emit({ type: 'context', runId: ctx.runId, topic: ctx.topic, query, mode: bundle.mode, totalChars: bundle.totalChars })
    if (bundle.mode === 'fallback_full') {
      console.warn(`[pipeline] ${ctx.runId} degraded context for "${query}": ${bundle.fallbackReason ?? 'fallback'}`)
    }
    return bundle
  }

  private async baseKnowledge(ctx: RunContext): Promise<{ overview: string }> {
    this.checkCancelled(ctx, 'BASE_KNOWLEDGE')
    const end = beginStep(ctx, 'base_knowledge')
    const bundle = await this.retrieve(ctx, ctx.topic)
    const overview = await this.deps.generator.generate(baseKnowledgePrompt(ctx.topic), renderContext(bundle), {
      systemPrompt: WRITER_SYSTEM_PROMPT,
      operation: 'base_knowledge',
    })
    if (!overview.ok) {
      end(false, { contextMode: bundle.mode }, overview.error.message)
      throw new StageFailure('BASE_KNOWLEDGE', overview.error)
    }
    end(true, { contextMode: bundle.mode, contextChars: bundle.totalChars, contentLength: overview.value.length })
    return { overview: overview.value }
  }

  private async topicSplit(
    ctx: RunContext,
    overview: string,
    supplied: string[] | undefined,
  ): Promise<{ subtopics: string[]; excerpts: Map<string, string> }> {
    this.checkCancelled(ctx, 'TOPIC_SPLIT')
    const end = beginStep(ctx, 'topic_split')
    let subtopics: string[]
    let excerpts = new Map<string, string>()
    let method: string

    if (supplied && supplied.length > 0) {
      subtopics = normalizeTopics(supplied)
      method = 'supplied'
    } else if (this.settings.topicSplit === 'local') {
      const split = splitByRomanNumerals(overview)
      subtopics = split.topics
      excerpts = split.sections
      method = 'local'
    } else {
      const response = await this.splitter.generate(topicSplitPrompt(overview), '', {
        systemPrompt: SPLIT_SYSTEM_PROMPT,
        operation: 'topic_split',
      })
      if (!response.ok) {
        end(false, { method: 'generate' }, response.error.message)
        throw new StageFailure('TOPIC_SPLIT', response.error)
      }
      subtopics = parseTopicList(response.value)
      method = 'generate'
    }

    if (subtopics.length === 0) {
      const error = KBForgeError.parse(`no subtopics derived (${method})`)
      end(false, { method }, error.message)
      throw new StageFailure('TOPIC_SPLIT', error)
    }

    end(true, { method, topicCount: subtopics.length, topics: subtopics })
    console.log(`[pipeline] ${ctx.runId} split into ${subtopics.length} subtopic(s) (${method})`)
    return { subtopics, excerpts }
  }

  private async deepDive(
    ctx: RunContext,
    subtopics: string[],
    excerpts: Map<string, string>,
  ): Promise<SubsectionResult[]> {
    const end = beginStep(ctx, 'deep_dive')
    // Join barrier: resolves once every subsection has settled.
    const settled = await mapSettled(subtopics, this.settings.subsectionWorkers, (subtopic, index) =>
      this.runSubsection(ctx, subtopic, index, excerpts.get(subtopic)),
    )

    const subsections = settled.map((outcome, index): SubsectionResult => {
      if (outcome.status === 'fulfilled') return outcome.value
      const title = subtopics[index]
      return {
        task: { topic: title, sectionPath: `${ctx.task.sectionPath}/${index + 1}`, status: 'failed', attempts: 0, confidence: null },
        title,
        content: null,
        issues: [],
        lowConfidence: false,
        contextMode: null,
        error: { code: 'INTERNAL_ERROR', message: errorMessage(outcome.reason) },
        durationMs: 0,
      }
    })

    const succeeded = subsections.filter((s) => s.task.status === 'succeeded').length
    end(succeeded > 0, {
      totalTopics: subtopics.length,
      successful: succeeded,
      lowConfidence: subsections.filter((s) => s.lowConfidence).length,
      failed: subtopics.length - succeeded,
    })
    return subsections
  }

  private async runSubsection(
    ctx: RunContext,
    subtopic: string,
    index: number,
    overviewExcerpt: string | undefined,
  ): Promise<SubsectionResult> {
    const startTime = Date.now()
    const task: GenerationTask = {
      topic: subtopic,
      sectionPath: `${ctx.task.sectionPath}/${index + 1}`,
      status: 'in_progress',
      attempts: 0,
      confidence: null,
    }
    const emit = (): void => ctx.emit({
      type: 'subsection',
      runId: ctx.runId,
      topic: ctx.topic,
      subtopic,
      status: task.status,
      attempt: task.attempts,
      confidence: task.confidence,
    })
    let issues: string[] = []

    const finish = (outcome: { content: string; lowConfidence: boolean } | { error: KBForgeError }, mode: ContextBundle['mode'] | null): SubsectionResult => {
      task.status = 'content' in outcome ? 'succeeded' : 'failed'
      emit()
      return {
        task,
        title: subtopic,
        content: 'content' in outcome ? outcome.content : null,
        issues,
        lowConfidence: 'content' in outcome && outcome.lowConfidence,
        contextMode: mode,
        ...('error' in outcome ? { error: { code: outcome.error.code, message: outcome.error.message } } : {}),
        durationMs: Date.now() - startTime,
      }
    }

    if (ctx.signal?.aborted) return finish({ error: KBForgeError.capability('cancelled') }, null)

    const bundle = await this.retrieve(ctx, `${ctx.topic}: ${subtopic}`)
    const context = renderContext(bundle)
    const maxAttempts = this.settings.maxRetries + 1
    let previousDraft: string | undefined

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (ctx.signal?.aborted) return finish({ error: KBForgeError.capability('cancelled') }, bundle.mode)
      task.attempts = attempt
      emit()

      const draft = await this.deps.generator.generate(
        deepDivePrompt({ topic: ctx.topic, subtopic, overviewExcerpt, previousDraft, issues }),
        context,
        { systemPrompt: WRITER_SYSTEM_PROMPT, operation: `deep_dive:${subtopic.slice(0, 40)}` },
      )
      if (!draft.ok) return finish({ error: draft.error }, bundle.mode)

      const strictness: Strictness = attempt >= this.settings.relaxFromAttempt ? 'medium' : 'high'
      const assessment = await this.deps.gate.evaluate(draft.value, bundle, subtopic, { strictness })
      task.confidence = assessment.confidence
      issues = assessment.issues

      if (assessment.passed) {
        return finish({ content: draft.value, lowConfidence: strictness !== 'high' }, bundle.mode)
      }

      previousDraft = draft.value
      if (attempt < maxAttempts) {
        console.warn(
          `[pipeline] ${ctx.runId} "${subtopic}" attempt ${attempt}/${maxAttempts} rejected ` +
          `(confidence ${assessment.confidence.toFixed(2)}), retrying`,
        )
      }
    }

    const error = KBForgeError.quality(
      `"${subtopic}" below threshold after ${maxAttempts} attempt(s) (last confidence ${(task.confidence ?? 0).toFixed(2)})`,
    )
    console.error(`[pipeline] ${ctx.runId} ${error.message}`)
    return finish({ error }, bundle.mode)
  }

  private async synthesize(ctx: RunContext, subsections: SubsectionResult[]): Promise<string> {
    this.checkCancelled(ctx, 'SYNTHESIS')
    const end = beginStep(ctx, 'synthesis')
    const sections: SynthesisSection[] = subsections.flatMap((s) =>
      s.task.status === 'succeeded' && s.content !== null
        ? [{ title: s.title, content: s.content, lowConfidence: s.lowConfidence }]
        : [],
    )

    if (sections.length === 0) {
      const error = KBForgeError.quality('no successful subsections to synthesize')
      end(false, { inputSections: 0 }, error.message)
      throw new StageFailure('SYNTHESIS', error)
    }

    if (this.settings.synthesis === 'local') {
      const article = synthesizeLocally(ctx.topic, sections)
      end(true, { mode: 'local', inputSections: sections.length, outputLength: article.length })
      return article
    }

    const response = await this.deps.generator.generate(synthesisPrompt(ctx.topic, sections), '', {
      systemPrompt: WRITER_SYSTEM_PROMPT,
      operation: 'synthesis',
    })
    if (!response.ok) {
      end(false, { mode: 'generate', inputSections: sections.length }, response.error.message)
      throw new StageFailure('SYNTHESIS', response.error)
    }
    end(true, { mode: 'generate', inputSections: sections.length, outputLength: response.value.length })
    return response.value
  }
}
