/**
 * Query-result cache for EmbeddingIndex.search, keyed by (query, topK, source).
 * Entries expire after a TTL; the oldest entry is evicted at capacity.
 * Any index write clears the whole cache.
 */

import type { SearchHit } from './schemas.js'

interface CacheEntry {
  hits: SearchHit[]
  expiresAt: number
}

export interface SearchCacheOptions {
  ttlMs: number
  maxEntries: number
  now?: () => number
}

export class SearchCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly now: () => number

  constructor(private readonly options: SearchCacheOptions) {
    this.now = options.now ?? Date.now
  }

  static key(query: string, topK: number, source: string | undefined): string {
    return JSON.stringify([query, topK, source ?? null])
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): SearchHit[] | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      return undefined
    }
    return entry.hits
  }

  set(key: string, hits: SearchHit[]): void {
    if (this.options.maxEntries === 0 || this.options.ttlMs === 0) return
    this.entries.delete(key)
    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
    this.entries.set(key, { hits, expiresAt: this.now() + this.options.ttlMs })
  }

  clear(): void {
    this.entries.clear()
  }
}
