/**
 * Pipeline: staged article generation for one topic.
 */

export { Pipeline, pipelineSettingsFromConfig } from './pipeline.js'
export type { PipelineDependencies, PipelineSettings, PipelineRunOptions } from './pipeline.js'
export { PipelineStageSchema, TaskStatusSchema } from './schemas.js'
export type {
  PipelineStage,
  WorkStage,
  TaskStatus,
  GenerationTask,
  UnitError,
  SubsectionResult,
  StepName,
  PipelineStep,
  PipelineResult,
  PipelineEvent,
  ProgressListener,
} from './schemas.js'
export { splitByRomanNumerals, parseTopicList, normalizeTopics } from './topic-split.js'
export type { LocalSplit } from './topic-split.js'
export { synthesizeLocally, REVIEW_NOTE } from './synthesis.js'
export {
  baseKnowledgePrompt,
  topicSplitPrompt,
  deepDivePrompt,
  synthesisPrompt,
  WRITER_SYSTEM_PROMPT,
  SPLIT_SYSTEM_PROMPT,
} from './prompts.js'
export type { SynthesisSection, DeepDivePromptInput } from './prompts.js'
