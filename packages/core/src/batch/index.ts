/**
 * Batch: multi-topic generation, outline parsing and article persistence.
 */

export { BatchRunner, planTopics, dryRunReport } from './batch-runner.js'
export type {
  BatchDependencies,
  BatchTopic,
  BatchRunOptions,
  BatchReport,
  BatchEvent,
  PlannedTopic,
  TopicOutcome,
  FailedStage,
  TopicPipeline,
  Reindexer,
} from './batch-runner.js'
export { parseOutlineSection } from './outline.js'
export type { OutlineSection } from './outline.js'
export { MarkdownArticleWriter, renderFrontmatter, ARTICLE_SOURCE_LABEL } from './article-writer.js'
export type { ArticleWriter, ArticleInput, SavedArticle } from './article-writer.js'
