/**
 * Zod schemas and defaults for kbforge configuration.
 *
 * Every tunable the pipeline and the sync subsystem read lives here; call sites
 * never hardcode thresholds, retry counts or budgets.
 */

import { z } from 'zod'
import { FilePathSchema, SourceNameSchema } from '../common/index.js'

export const ProviderNameSchema = z.enum(['anthropic', 'openai', 'ollama'])
export type ProviderName = z.infer<typeof ProviderNameSchema>

export const EmbeddingProviderNameSchema = z.enum(['openai', 'ollama'])
export type EmbeddingProviderName = z.infer<typeof EmbeddingProviderNameSchema>

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(2),
  baseDelayMs: z.number().int().nonnegative().default(500),
})

export const GenerationConfigSchema = z.object({
  provider: ProviderNameSchema.default('anthropic'),
  model: z.string().min(1).max(128).optional(),
  apiKey: z.string().optional(),
  ollamaBaseUrl: z.string().optional(),
  maxTokens: z.number().int().positive().default(8192),
  timeoutMs: z.number().int().positive().default(120_000),
  retry: RetryConfigSchema.default({}),
})

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>

export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderNameSchema.default('openai'),
  model: z.string().min(1).optional(),
  dimensions: z.number().int().positive().optional(),
  apiKey: z.string().optional(),
  ollamaBaseUrl: z.string().optional(),
  timeoutMs: z.number().int().positive().default(30_000),
  retry: RetryConfigSchema.default({}),
})

export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>

export const IndexConfigSchema = z.object({
  dbPath: FilePathSchema.default('.kbforge/index.db'),
  /** Characters of content (after the title) that feed a document's embedding. */
  embedContentChars: z.number().int().positive().default(2000),
  searchCacheTtlMs: z.number().int().nonnegative().default(300_000),
  searchCacheMaxEntries: z.number().int().nonnegative().default(100),
})

export const MarkdownSourceSchema = z.object({
  type: z.literal('markdown'),
  source: SourceNameSchema,
  path: FilePathSchema,
})

export const DataSourceSchema = z.object({
  type: z.literal('data'),
  source: SourceNameSchema,
  path: FilePathSchema,
  arrayName: z.string().min(1),
  transform: z.enum(['question', 'blindspot']),
})

export const WikiSourceSchema = z.object({
  type: z.literal('wiki'),
  source: SourceNameSchema.default('wiki'),
  path: FilePathSchema,
  arrayName: z.string().min(1).default('knowledgeBaseWikiSections'),
})

export const SourceConfigSchema = z.discriminatedUnion('type', [
  MarkdownSourceSchema,
  DataSourceSchema,
  WikiSourceSchema,
])

export type MarkdownSourceConfig = z.infer<typeof MarkdownSourceSchema>
export type DataSourceConfig = z.infer<typeof DataSourceSchema>
export type WikiSourceConfig = z.infer<typeof WikiSourceSchema>
export type SourceConfig = z.infer<typeof SourceConfigSchema>

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  charBudget: z.number().int().positive().default(60_000),
  /** Below this many packed chars the RAG bundle is considered unusable. */
  minUsableChars: z.number().int().nonnegative().default(500),
  fallbackCharBudget: z.number().int().positive().default(400_000),
})

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>

export const QualityConfigSchema = z.object({
  /** Confidence at or above this value is accepted. */
  threshold: z.number().min(0).max(1).default(0.7),
  /** Regenerations after the first draft; a subsection gets maxRetries + 1 attempts. */
  maxRetries: z.number().int().min(0).max(10).default(2),
  /** Attempt number from which the rubric relaxes from high to medium strictness. */
  relaxFromAttempt: z.number().int().positive().default(3),
})

export type QualityConfig = z.infer<typeof QualityConfigSchema>

export const PipelineConfigSchema = z.object({
  subsectionWorkers: z.number().int().min(1).max(20).default(4),
  topicSplit: z.enum(['generate', 'local']).default('generate'),
  synthesis: z.enum(['local', 'generate']).default('local'),
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

export const BatchConfigSchema = z.object({
  maxWorkers: z.number().int().min(1).max(20).default(3),
  /** Directory generated articles are written to; normally the kb markdown source. */
  outputDir: FilePathSchema.default('knowledge-base'),
  /** Run an incremental sync after a batch writes articles. */
  reindexAfterRun: z.boolean().default(true),
})

export type BatchConfig = z.infer<typeof BatchConfigSchema>

export const AppConfigSchema = z.object({
  generation: GenerationConfigSchema.default({}),
  /** Evaluator for the quality gate; defaults to the generation settings. */
  evaluation: GenerationConfigSchema.optional(),
  embedding: EmbeddingConfigSchema.default({}),
  index: IndexConfigSchema.default({}),
  sources: z.array(SourceConfigSchema).default([
    { type: 'markdown', source: 'kb', path: 'knowledge-base' },
  ]),
  retrieval: RetrievalConfigSchema.default({}),
  quality: QualityConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  batch: BatchConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>

/** Fully defaulted configuration. */
export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({})
}
