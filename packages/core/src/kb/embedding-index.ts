/**
 * EmbeddingIndex: the single logical store of IndexRecords.
 *
 * Wraps a VectorStore and an EmbeddingClient. Documents are embedded from
 * their title plus leading content; every embedding call carries the
 * configured timeout and retry policy.
 */

import { Ok, Err, KBForgeError, callCapability, errorMessage } from '../common/index.js'
import type { Result, RetryPolicy } from '../common/index.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { VectorStore } from './vector-store.js'
import type { Document, DocumentFilter, IndexStats, SearchHit, SourceDocument } from './schemas.js'
import { SearchCache } from './search-cache.js'

export interface EmbeddingIndexOptions {
  /** Characters of content after the title that feed a document embedding. */
  embedContentChars: number
  timeoutMs: number
  retry: RetryPolicy
  cache?: { ttlMs: number; maxEntries: number }
  now?: () => Date
  sleep?: (ms: number) => Promise<void>
}

export function embeddingText(doc: Pick<SourceDocument, 'title' | 'content'>, contentChars: number): string {
  return `${doc.title}\n\n${doc.content.slice(0, contentChars)}`
}

export class EmbeddingIndex {
  private readonly cache: SearchCache | null
  private readonly now: () => Date

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingClient,
    private readonly options: EmbeddingIndexOptions,
  ) {
    this.cache = options.cache ? new SearchCache(options.cache) : null
    this.now = options.now ?? (() => new Date())
  }

  get embeddingModel(): string {
    return this.embedder.providerFingerprint
  }

  /** Embed a single text. */
  async embed(text: string, signal?: AbortSignal): Promise<Result<number[], KBForgeError>> {
    return callCapability<number[]>(
      {
        label: `embed:${this.embedder.modelName}`,
        timeoutMs: this.options.timeoutMs,
        retry: this.options.retry,
        signal,
        sleep: this.options.sleep,
      },
      async (callSignal) => {
        const { embeddings } = await this.embedder.embed([text], callSignal)
        const vector = embeddings[0]
        if (!vector || vector.length === 0) {
          return Err(KBForgeError.capability(`embed:${this.embedder.modelName} returned no vector`))
        }
        return Ok(vector)
      },
    )
  }

  /** Embed and store a document, stamping indexedAt. */
  async upsertDocument(doc: SourceDocument, signal?: AbortSignal): Promise<Result<Document, KBForgeError>> {
    const vector = await this.embed(embeddingText(doc, this.options.embedContentChars), signal)
    if (!vector.ok) return vector

    const indexed: Document = { ...doc, indexedAt: this.now().toISOString() }
    const stored = await this.store.upsert({
      ...indexed,
      embedding: Float32Array.from(vector.value),
      embeddingModel: this.embedder.providerFingerprint,
    })
    this.cache?.clear()
    if (!stored.ok) return stored
    return Ok(indexed)
  }

  async deleteDocument(docId: string): Promise<Result<boolean, KBForgeError>> {
    const result = await this.store.delete(docId)
    this.cache?.clear()
    return result
  }

  /** Delete every record of a source. Returns the number removed. */
  async purgeSource(source: string): Promise<Result<number, KBForgeError>> {
    const docs = await this.store.list({ source })
    if (!docs.ok) return docs

    let removed = 0
    for (const doc of docs.value) {
      const result = await this.store.delete(doc.docId)
      if (!result.ok) {
        this.cache?.clear()
        return result
      }
      if (result.value) removed++
    }
    this.cache?.clear()
    console.log(`[index] purged ${removed} document(s) from source "${source}"`)
    return Ok(removed)
  }

  async search(
    query: string,
    topK: number,
    filter: DocumentFilter = {},
    signal?: AbortSignal,
  ): Promise<Result<SearchHit[], KBForgeError>> {
    const key = SearchCache.key(query, topK, filter.source)
    const cached = this.cache?.get(key)
    if (cached) return Ok(cached)

    const vector = await this.embed(query, signal)
    if (!vector.ok) return vector

    const hits = await this.searchVector(vector.value, topK, filter)
    if (hits.ok) this.cache?.set(key, hits.value)
    return hits
  }

  searchVector(vector: ArrayLike<number>, topK: number, filter: DocumentFilter = {}): Promise<Result<SearchHit[], KBForgeError>> {
    return this.store.search(vector, topK, filter)
  }

  listBySource(source?: string): Promise<Result<Document[], KBForgeError>> {
    return this.store.list(source ? { source } : {})
  }

  getDocument(docId: string): Promise<Result<Document | null, KBForgeError>> {
    return this.store.get(docId)
  }

  async stats(): Promise<Result<IndexStats, KBForgeError>> {
    const result = await this.store.stats()
    if (!result.ok) {
      console.error(`[index] stats failed: ${errorMessage(result.error)}`)
    }
    return result
  }
}
