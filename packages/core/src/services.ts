/**
 * Composition root: wires the index, sources, retriever and generation
 * pipeline from an AppConfig. Capabilities are created lazily so that
 * index-only commands never need generation credentials.
 */

import type Database from 'better-sqlite3'
import { Generator } from './agents/index.js'
import type { TextGenerator } from './agents/index.js'
import { requireCapabilities } from './config/index.js'
import type { AppConfig } from './config/index.js'
import { EmbeddingIndex, SqliteVectorStore, createEmbeddingClient } from './kb/index.js'
import type { EmbeddingClient } from './kb/index.js'
import { openDatabase } from './storage/index.js'
import { DocumentSyncer, createDocumentSources } from './sync/index.js'
import type { DocumentSource } from './sync/index.js'
import { ContextRetriever } from './retrieval/index.js'
import { QualityGate } from './quality/index.js'
import { Pipeline, pipelineSettingsFromConfig } from './pipeline/index.js'
import { BatchRunner, MarkdownArticleWriter } from './batch/index.js'

export interface KnowledgeBaseOverrides {
  /** Replaces the configured embedding provider. */
  embedder?: EmbeddingClient
  db?: Database.Database
}

export interface KnowledgeBase {
  db: Database.Database
  index: EmbeddingIndex
  sources: DocumentSource[]
  syncer: DocumentSyncer
  retriever: ContextRetriever
  close(): void
}

export function openKnowledgeBase(config: AppConfig, overrides: KnowledgeBaseOverrides = {}): KnowledgeBase {
  if (!overrides.embedder) requireCapabilities(config, ['embedding'])
  const embedder = overrides.embedder ?? createEmbeddingClient(config.embedding)
  const sources = createDocumentSources(config.sources)
  const db = overrides.db ?? openDatabase(config.index.dbPath)

  const index = new EmbeddingIndex(new SqliteVectorStore(db), embedder, {
    embedContentChars: config.index.embedContentChars,
    timeoutMs: config.embedding.timeoutMs,
    retry: config.embedding.retry,
    cache: { ttlMs: config.index.searchCacheTtlMs, maxEntries: config.index.searchCacheMaxEntries },
  })

  return {
    db,
    index,
    sources,
    syncer: new DocumentSyncer(index, sources),
    retriever: new ContextRetriever(index, sources, config.retrieval),
    close: () => db.close(),
  }
}

export interface GenerationOverrides {
  generator?: TextGenerator
  /** Quality-gate evaluator; defaults to the evaluation config, else the generator. */
  evaluator?: TextGenerator
}

export function createBatchRunner(
  config: AppConfig,
  kb: KnowledgeBase,
  overrides: GenerationOverrides = {},
): BatchRunner {
  const needs: Array<'generation' | 'evaluation'> = []
  if (!overrides.generator) needs.push('generation')
  if (!overrides.evaluator && config.evaluation) needs.push('evaluation')
  requireCapabilities(config, needs)

  const generator = overrides.generator ?? Generator.fromConfig(config.generation)
  const evaluator = overrides.evaluator ?? (config.evaluation ? Generator.fromConfig(config.evaluation) : generator)

  const pipeline = new Pipeline(
    { generator, retriever: kb.retriever, gate: new QualityGate(evaluator, config.quality) },
    pipelineSettingsFromConfig(config),
  )

  return new BatchRunner({
    pipeline,
    writer: new MarkdownArticleWriter(config.batch.outputDir),
    reindexer: {
      sync: async (options) => {
        const report = await kb.syncer.sync(options)
        kb.retriever.invalidateCorpus()
        return report
      },
    },
  })
}
