/**
 * BatchRunner: one Pipeline run per topic across a bounded worker pool.
 *
 * Topics are independent: a failed topic never cancels or alters another.
 * After cancellation no new topic is dispatched, and the results of topics
 * still in flight are discarded and reported as skipped.
 */

import { mapSettled, errorMessage, titleToSlug } from '../common/index.js'
import type { PipelineEvent, PipelineResult, PipelineRunOptions, UnitError, WorkStage } from '../pipeline/index.js'
import type { SyncOptions, SyncReport } from '../sync/index.js'
import type { ArticleWriter } from './article-writer.js'

export interface TopicPipeline {
  run(topic: string, options?: PipelineRunOptions): Promise<PipelineResult>
}

export interface Reindexer {
  sync(options?: SyncOptions): Promise<SyncReport>
}

export interface BatchDependencies {
  pipeline: TopicPipeline
  writer?: ArticleWriter
  /** Incremental sync run once after articles were written. */
  reindexer?: Reindexer
}

export interface BatchTopic {
  topic: string
  /** Externally supplied subtopics; derived at run time when absent. */
  subtopics?: string[]
  sectionPath?: string
}

export interface PlannedTopic {
  topic: string
  slug: string
  subtopics: string[] | null
}

export type FailedStage = WorkStage | 'PERSIST'

export type TopicOutcome =
  | {
    status: 'succeeded'
    topic: string
    slug: string
    runId: string
    articlePath: string | null
    subtopicCount: number
    lowConfidenceCount: number
    failedSubsections: string[]
    durationMs: number
  }
  | {
    status: 'failed'
    topic: string
    slug: string
    runId: string | null
    stage: FailedStage
    error: UnitError
    /** Per-subsection failures, "<title>: <reason>". */
    issues: string[]
    durationMs: number
  }
  | {
    status: 'skipped'
    topic: string
    slug: string
    reason: string
  }

export interface BatchReport {
  dryRun: boolean
  cancelled: boolean
  total: number
  succeeded: number
  failed: number
  skipped: number
  /** In input order. */
  results: TopicOutcome[]
  /** Present on dry runs. */
  plan: PlannedTopic[] | null
  reindex: SyncReport | null
  durationMs: number
}

export type BatchEvent =
  | { type: 'topic_started'; topic: string; index: number }
  | { type: 'topic_finished'; topic: string; index: number; status: TopicOutcome['status'] }
  | { type: 'pipeline'; event: PipelineEvent }

export interface BatchRunOptions {
  maxWorkers: number
  dryRun?: boolean
  signal?: AbortSignal
  reindexAfterRun?: boolean
  onProgress?: (event: BatchEvent) => void
}

function toBatchTopic(input: string | BatchTopic): BatchTopic {
  return typeof input === 'string' ? { topic: input } : input
}

function summarize(results: TopicOutcome[]): Pick<BatchReport, 'total' | 'succeeded' | 'failed' | 'skipped'> {
  return {
    total: results.length,
    succeeded: results.filter((r) => r.status === 'succeeded').length,
    failed: results.filter((r) => r.status === 'failed').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
  }
}

/** The plan a run would execute; makes no capability call. */
export function planTopics(topics: Array<string | BatchTopic>): PlannedTopic[] {
  return topics.map(toBatchTopic).map((t) => ({
    topic: t.topic,
    slug: titleToSlug(t.topic),
    subtopics: t.subtopics && t.subtopics.length > 0 ? [...t.subtopics] : null,
  }))
}

export function dryRunReport(topics: Array<string | BatchTopic>): BatchReport {
  const plan = planTopics(topics)
  console.log(`[batch] dry run: ${plan.length} topic(s) planned`)
  return {
    dryRun: true,
    cancelled: false,
    total: plan.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    results: [],
    plan,
    reindex: null,
    durationMs: 0,
  }
}

export class BatchRunner {
  constructor(private readonly deps: BatchDependencies) {}

  async run(topics: Array<string | BatchTopic>, options: BatchRunOptions): Promise<BatchReport> {
    const startTime = Date.now()
    const items = topics.map(toBatchTopic)

    if (options.dryRun) return dryRunReport(items)

    console.log(`[batch] running ${items.length} topic(s) with ${options.maxWorkers} worker(s)`)
    const settled = await mapSettled(items, options.maxWorkers, (item, index) => this.runTopic(item, index, options))

    const results = settled.map((outcome, index): TopicOutcome => {
      if (outcome.status === 'fulfilled') return outcome.value
      const item = items[index]
      return {
        status: 'failed',
        topic: item.topic,
        slug: titleToSlug(item.topic),
        runId: null,
        stage: 'BASE_KNOWLEDGE',
        error: { code: 'INTERNAL_ERROR', message: errorMessage(outcome.reason) },
        issues: [],
        durationMs: 0,
      }
    })

    const counts = summarize(results)
    let reindex: SyncReport | null = null
    if (options.reindexAfterRun !== false && this.deps.reindexer && this.deps.writer && counts.succeeded > 0) {
      console.log('[batch] re-indexing after run')
      reindex = await this.deps.reindexer.sync()
    }

    const durationMs = Date.now() - startTime
    console.log(
      `[batch] done: ${counts.succeeded} succeeded, ${counts.failed} failed, ${counts.skipped} skipped in ${durationMs}ms`,
    )
    return {
      dryRun: false,
      cancelled: options.signal?.aborted ?? false,
      ...counts,
      results,
      plan: null,
      reindex,
      durationMs,
    }
  }

  private async runTopic(item: BatchTopic, index: number, options: BatchRunOptions): Promise<TopicOutcome> {
    const slug = titleToSlug(item.topic)
    if (options.signal?.aborted) {
      return { status: 'skipped', topic: item.topic, slug, reason: 'cancelled' }
    }

    options.onProgress?.({ type: 'topic_started', topic: item.topic, index })
    const outcome = await this.executeTopic(item, slug, options)
    options.onProgress?.({ type: 'topic_finished', topic: item.topic, index, status: outcome.status })
    return outcome
  }

  private async executeTopic(item: BatchTopic, slug: string, options: BatchRunOptions): Promise<TopicOutcome> {
    const startTime = Date.now()
    const result = await this.deps.pipeline.run(item.topic, {
      subtopics: item.subtopics,
      sectionPath: item.sectionPath,
      signal: options.signal,
      onProgress: options.onProgress ? (event) => options.onProgress?.({ type: 'pipeline', event }) : undefined,
    })

    if (options.signal?.aborted) {
      console.warn(`[batch] discarding result for "${item.topic}": batch cancelled`)
      return { status: 'skipped', topic: item.topic, slug, reason: 'cancelled' }
    }

    const issues = result.subsections
      .filter((s) => s.task.status === 'failed')
      .map((s) => `${s.title}: ${s.error?.message ?? 'failed'}`)

    if (result.stage === 'FAILED' || result.article === null) {
      return {
        status: 'failed',
        topic: item.topic,
        slug,
        runId: result.runId,
        stage: result.failedStage ?? 'SYNTHESIS',
        error: result.error ?? { code: 'INTERNAL_ERROR', message: 'pipeline produced no article' },
        issues,
        durationMs: Date.now() - startTime,
      }
    }

    let articlePath: string | null = null
    if (this.deps.writer) {
      const saved = await this.deps.writer.save({
        title: item.topic,
        slug,
        content: result.article,
        lowConfidenceCount: result.lowConfidenceCount,
        failedSubsections: result.failedSubsections,
        runId: result.runId,
      })
      if (!saved.ok) {
        console.error(`[batch] "${item.topic}": ${saved.error.message}`)
        return {
          status: 'failed',
          topic: item.topic,
          slug,
          runId: result.runId,
          stage: 'PERSIST',
          error: { code: saved.error.code, message: saved.error.message },
          issues,
          durationMs: Date.now() - startTime,
        }
      }
      articlePath = saved.value.path
    }

    return {
      status: 'succeeded',
      topic: item.topic,
      slug,
      runId: result.runId,
      articlePath,
      subtopicCount: result.subtopics.length,
      lowConfidenceCount: result.lowConfidenceCount,
      failedSubsections: result.failedSubsections,
      durationMs: Date.now() - startTime,
    }
  }
}
