/**
 * Pipeline state, task and result types.
 */

import { z } from 'zod'
import type { ErrorCode } from '../common/index.js'
import type { RetrievalMode } from '../retrieval/index.js'

export const PipelineStageSchema = z.enum([
  'BASE_KNOWLEDGE',
  'TOPIC_SPLIT',
  'DEEP_DIVE',
  'SYNTHESIS',
  'DONE',
  'FAILED',
])
export type PipelineStage = z.infer<typeof PipelineStageSchema>

/** Stages that do work; DONE and FAILED are terminal. */
export type WorkStage = Exclude<PipelineStage, 'DONE' | 'FAILED'>

export const TaskStatusSchema = z.enum(['pending', 'in_progress', 'succeeded', 'failed'])
export type TaskStatus = z.infer<typeof TaskStatusSchema>

export interface GenerationTask {
  topic: string
  /** "2.6" for an outline section, "2.6/3" for its third subsection. */
  sectionPath: string
  status: TaskStatus
  attempts: number
  confidence: number | null
}

export interface UnitError {
  code: ErrorCode
  message: string
}

export interface SubsectionResult {
  task: GenerationTask
  title: string
  content: string | null
  /** Issues from the last assessment. */
  issues: string[]
  /** Passed only under the relaxed rubric. */
  lowConfidence: boolean
  contextMode: RetrievalMode | null
  error?: UnitError
  durationMs: number
}

export type StepName = 'base_knowledge' | 'topic_split' | 'deep_dive' | 'synthesis'

export interface PipelineStep {
  name: StepName
  startedAt: string
  durationMs: number
  success: boolean
  error?: string
  metadata: Record<string, string | number | boolean | string[]>
}

export interface PipelineResult {
  runId: string
  topic: string
  /** Terminal state. */
  stage: 'DONE' | 'FAILED'
  /** Stage that failed, when stage is FAILED. */
  failedStage?: WorkStage
  error?: UnitError
  task: GenerationTask
  subtopics: string[]
  subsections: SubsectionResult[]
  /** Synthesized article; null unless DONE. */
  article: string | null
  lowConfidenceCount: number
  failedSubsections: string[]
  steps: PipelineStep[]
  totalDurationMs: number
}

export type PipelineEvent =
  | { type: 'stage'; runId: string; topic: string; stage: PipelineStage }
  | { type: 'subsection'; runId: string; topic: string; subtopic: string; status: TaskStatus; attempt: number; confidence: number | null }
  | { type: 'context'; runId: string; topic: string; query: string; mode: RetrievalMode; totalChars: number }

export type ProgressListener = (event: PipelineEvent) => void
