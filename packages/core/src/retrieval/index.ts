/**
 * Retrieval: RAG context bundles with full-corpus fallback.
 */

export { ContextRetriever } from './context-retriever.js'
export type { Retriever, DocumentMatch, RetrievalOptions } from './context-retriever.js'
export { packDocuments, renderContext, TRUNCATION_MARKER } from './context-bundle.js'
export type { ContextBundle, RetrievalMode, RetrievedDocument, PackResult } from './context-bundle.js'
export { loadCorpus } from './corpus-loader.js'
export type { CorpusDocument } from './corpus-loader.js'
