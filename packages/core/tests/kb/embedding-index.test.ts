import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { EmbeddingIndex, SqliteVectorStore, embeddingText } from '../../src/kb/index.js'
import type { SourceDocument } from '../../src/kb/index.js'
import { computeContentHash } from '../../src/common/index.js'
import { FakeEmbeddingClient, NO_RETRY } from '../support/fakes.js'

function doc(docId: string, title: string, content: string): SourceDocument {
  return {
    docId,
    source: docId.split(':')[0],
    title,
    content,
    contentHash: computeContentHash(content),
    charCount: content.length,
    metadata: {},
  }
}

let db: Database.Database
let embedder: FakeEmbeddingClient
let index: EmbeddingIndex

beforeEach(() => {
  db = openDatabase(':memory:')
  embedder = new FakeEmbeddingClient()
  index = new EmbeddingIndex(new SqliteVectorStore(db), embedder, {
    embedContentChars: 10,
    timeoutMs: 1000,
    retry: NO_RETRY,
    cache: { ttlMs: 60_000, maxEntries: 10 },
    now: () => new Date('2026-03-01T12:00:00.000Z'),
  })
})

afterEach(() => {
  db.close()
})

describe('embeddingText', () => {
  it('joins the title and the leading content', () => {
    expect(embeddingText({ title: 'Caching', content: 'abcdefghijklmnop' }, 5)).toBe('Caching\n\nabcde')
  })
})

describe('EmbeddingIndex', () => {
  it('embeds title plus content prefix and stamps indexedAt', async () => {
    const result = await index.upsertDocument(doc('kb:cache', 'Caching', 'write-through and write-back'))
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.indexedAt).toBe('2026-03-01T12:00:00.000Z')
    expect(embedder.calls).toEqual(['Caching\n\nwrite-thro'])

    const stored = await index.getDocument('kb:cache')
    if (!stored.ok) throw stored.error
    expect(stored.value?.content).toBe('write-through and write-back')
  })

  it('stores nothing when embedding fails', async () => {
    embedder.failWhen = () => true
    const result = await index.upsertDocument(doc('kb:x', 'X', 'x'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('CAPABILITY_ERROR')
      expect(result.error.message).toBe('embed:fake-embed failed: connection reset')
    }
    const listed = await index.listBySource()
    if (!listed.ok) throw listed.error
    expect(listed.value).toEqual([])
  })

  it('returns the most similar document first', async () => {
    await index.upsertDocument(doc('kb:queues', 'Message queues', 'brokers'))
    await index.upsertDocument(doc('kb:cache', 'Cache eviction', 'lru'))

    const hits = await index.search('cache eviction', 1)
    if (!hits.ok) throw hits.error
    expect(hits.value.map((h) => h.docId)).toEqual(['kb:cache'])
  })

  it('serves repeated queries from the cache until the next write', async () => {
    await index.upsertDocument(doc('kb:cache', 'Cache eviction', 'lru'))
    const before = embedder.calls.length

    await index.search('eviction', 3)
    await index.search('eviction', 3)
    expect(embedder.calls.length).toBe(before + 1)

    await index.upsertDocument(doc('kb:other', 'Other', 'text'))
    await index.search('eviction', 3)
    expect(embedder.calls.length).toBe(before + 3)
  })

  it('purges one source and reports the count', async () => {
    await index.upsertDocument(doc('kb:a', 'A', 'a'))
    await index.upsertDocument(doc('kb:b', 'B', 'b'))
    await index.upsertDocument(doc('wiki:c', 'C', 'c'))

    expect(await index.purgeSource('kb')).toEqual({ ok: true, value: 2 })
    const stats = await index.stats()
    if (!stats.ok) throw stats.error
    expect(stats.value.bySource).toEqual({ wiki: 1 })
  })

  it('deleteDocument reports a miss as false', async () => {
    expect(await index.deleteDocument('kb:none')).toEqual({ ok: true, value: false })
  })

  it('exposes the embedder fingerprint', () => {
    expect(index.embeddingModel).toBe('fake:fake-embed:v1')
  })
})
