/**
 * ContextRetriever: semantic context for one query.
 *
 * RAG path: embed the query, take the top-K nearest records, pack their content
 * in rank order under the character budget. Falls back to the full corpus when
 * the index is unreachable or empty, or when the packed content is too small to
 * be useful.
 */

import type { KBForgeError, Result } from '../common/index.js'
import { Ok } from '../common/index.js'
import type { RetrievalConfig } from '../config/index.js'
import type { Document, EmbeddingIndex } from '../kb/index.js'
import type { DocumentSource } from '../sync/index.js'
import { packDocuments } from './context-bundle.js'
import type { ContextBundle } from './context-bundle.js'
import { loadCorpus } from './corpus-loader.js'

export interface Retriever {
  retrieve(query: string, topK?: number, signal?: AbortSignal): Promise<ContextBundle>
}

export interface DocumentMatch {
  docId: string
  source: string
  title: string
  score: number
  charCount: number
  indexedAt: string
}

export type RetrievalOptions = Pick<RetrievalConfig, 'topK' | 'charBudget' | 'minUsableChars' | 'fallbackCharBudget'>

export class ContextRetriever implements Retriever {
  private corpus: Promise<Document[]> | null = null

  constructor(
    private readonly index: EmbeddingIndex,
    private readonly sources: DocumentSource[],
    private readonly options: RetrievalOptions,
  ) {}

  async retrieve(query: string, topK: number = this.options.topK, signal?: AbortSignal): Promise<ContextBundle> {
    const hits = await this.index.search(query, topK, {}, signal)
    if (!hits.ok) {
      return this.fallback(query, `index unavailable: ${hits.error.message}`)
    }
    if (hits.value.length === 0) {
      return this.fallback(query, 'index returned no documents')
    }

    const packed = packDocuments(hits.value, this.options.charBudget)
    if (packed.totalChars < this.options.minUsableChars) {
      return this.fallback(query, `retrieved ${packed.totalChars} chars, below minimum ${this.options.minUsableChars}`)
    }

    console.log(`[retrieval] rag "${query}": ${packed.docs.length} doc(s), ${packed.totalChars} chars`)
    return { query, mode: 'rag', retrievedDocs: packed.docs, totalChars: packed.totalChars, truncated: packed.truncated }
  }

  /** Top-K document metadata with similarity scores. */
  async searchDocuments(query: string, topK: number = this.options.topK): Promise<Result<DocumentMatch[], KBForgeError>> {
    const hits = await this.index.search(query, topK)
    if (!hits.ok) return hits
    return Ok(hits.value.map((hit) => ({
      docId: hit.docId,
      source: hit.source,
      title: hit.title,
      score: hit.score,
      charCount: hit.charCount,
      indexedAt: hit.indexedAt,
    })))
  }

  /** Drop the memoised corpus, e.g. after new articles were written. */
  invalidateCorpus(): void {
    this.corpus = null
  }

  private async fallback(query: string, reason: string): Promise<ContextBundle> {
    console.warn(`[retrieval] degraded mode for "${query}": ${reason}`)
    if (!this.corpus) {
      this.corpus = loadCorpus(this.sources)
    }
    const corpus = await this.corpus
    const packed = packDocuments(corpus.map((doc) => ({ ...doc, score: null })), this.options.fallbackCharBudget)
    return {
      query,
      mode: 'fallback_full',
      retrievedDocs: packed.docs,
      totalChars: packed.totalChars,
      truncated: packed.truncated,
      fallbackReason: reason,
    }
  }
}
