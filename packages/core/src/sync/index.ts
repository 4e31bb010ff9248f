/**
 * Sync: source enumeration, loose literal parsing and incremental index sync.
 */

export { parseExportedArray, parseLiteral, locateExportedArray, readRawField } from './literal-parser.js'
export type { LiteralValue, LiteralObject, EntryParseError } from './literal-parser.js'

export { extractTitle, extractMetadata, stripFrontmatter } from './markdown.js'

export {
  transformQuestion,
  transformBlindspot,
  transformWikiSection,
  makeSourceDocument,
  ENTRY_TRANSFORMS,
} from './transforms.js'
export type { EntryTransformName, TransformFailure, TransformResult } from './transforms.js'

export {
  MarkdownSource,
  DataSource,
  WikiSource,
  createDocumentSource,
  createDocumentSources,
  markdownSlug,
  MTIME_KEY,
} from './sources.js'
export type { DocumentSource, SourceEntry, EnumerateContext } from './sources.js'

export { DocumentSyncer, buildSyncPlan } from './document-syncer.js'
export type { SyncPlanResult } from './document-syncer.js'

export type {
  SyncPlan,
  SkippedUnit,
  SyncFailure,
  SourceSyncReport,
  SyncReport,
  SyncOptions,
} from './schemas.js'
