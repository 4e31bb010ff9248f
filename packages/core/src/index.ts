/**
 * @kbforge/core
 *
 * Knowledge-base article generation and retrieval: document sync into an
 * embedding index, context retrieval with a full-corpus fallback, a staged
 * generation pipeline behind a quality gate, and batch orchestration.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './agents/index.js'
export * from './storage/index.js'
export * from './kb/index.js'
export * from './sync/index.js'
export * from './retrieval/index.js'
export * from './quality/index.js'
export * from './pipeline/index.js'
export * from './batch/index.js'
export { openKnowledgeBase, createBatchRunner } from './services.js'
export type { KnowledgeBase, KnowledgeBaseOverrides, GenerationOverrides } from './services.js'
