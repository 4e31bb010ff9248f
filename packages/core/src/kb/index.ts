/**
 * Knowledge base index: documents, embeddings, vector store and search.
 */

export {
  BUILTIN_SOURCES,
  DocIdSchema,
  DocumentSchema,
  docIdFor,
  parseDocId,
} from './schemas.js'
export type {
  BuiltinSource,
  Document,
  SourceDocument,
  IndexRecord,
  SearchHit,
  DocumentFilter,
  IndexStats,
} from './schemas.js'

export type { EmbeddingClient, EmbedResult } from './embedding-client.js'
export { l2Normalize } from './embedding-client.js'
export { OpenAIEmbeddingClient } from './openai-embeddings.js'
export { OllamaEmbeddingClient } from './ollama-embeddings.js'
export { createEmbeddingClient, DEFAULT_EMBEDDING_MODELS } from './embedding-factory.js'

export { packFloat32, unpackFloat32, cosineSimilarity, rankBySimilarity } from './vector-search.js'
export type { RankCandidate } from './vector-search.js'

export type { VectorStore } from './vector-store.js'
export { SqliteVectorStore } from './sqlite-vector-store.js'

export { SearchCache } from './search-cache.js'
export type { SearchCacheOptions } from './search-cache.js'

export { EmbeddingIndex, embeddingText } from './embedding-index.js'
export type { EmbeddingIndexOptions } from './embedding-index.js'
