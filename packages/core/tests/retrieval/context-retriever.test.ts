import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { EmbeddingIndex, SqliteVectorStore } from '../../src/kb/index.js'
import { DocumentSyncer, createDocumentSources } from '../../src/sync/index.js'
import type { DocumentSource } from '../../src/sync/index.js'
import { ContextRetriever } from '../../src/retrieval/index.js'
import type { RetrievalOptions } from '../../src/retrieval/index.js'
import { FakeEmbeddingClient, NO_RETRY } from '../support/fakes.js'

let dir: string
let db: Database.Database
let embedder: FakeEmbeddingClient
let index: EmbeddingIndex
let sources: DocumentSource[]

const OPTIONS: RetrievalOptions = { topK: 2, charBudget: 10_000, minUsableChars: 10, fallbackCharBudget: 10_000 }

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'kbforge-retrieval-'))
  await mkdir(join(dir, 'kb'))
  await writeFile(join(dir, 'kb', 'cache.md'), '---\ntitle: "Cache"\n---\n# Cache eviction\n\nLRU evicts the least recently used entry.')
  await writeFile(join(dir, 'kb', 'queues.md'), '# Message queues\n\nBrokers buffer messages between services.')
  await writeFile(join(dir, 'kb', 'empty.md'), '---\ntitle: "Empty"\n---\n')
  db = openDatabase(':memory:')
  embedder = new FakeEmbeddingClient()
  index = new EmbeddingIndex(new SqliteVectorStore(db), embedder, {
    embedContentChars: 2000,
    timeoutMs: 1000,
    retry: NO_RETRY,
  })
  sources = createDocumentSources([{ type: 'markdown', source: 'kb', path: join(dir, 'kb') }])
})

afterEach(async () => {
  db.close()
  await rm(dir, { recursive: true, force: true })
})

describe('ContextRetriever', () => {
  it('returns ranked documents from the index', async () => {
    await new DocumentSyncer(index, sources).sync()
    const retriever = new ContextRetriever(index, sources, OPTIONS)

    const bundle = await retriever.retrieve('cache eviction', 1)
    expect(bundle.mode).toBe('rag')
    expect(bundle.retrievedDocs.map((d) => d.docId)).toEqual(['kb:cache'])
    expect(bundle.retrievedDocs[0].score).toBeGreaterThan(0)
    expect(bundle.totalChars).toBe(bundle.retrievedDocs[0].content.length)
    expect(bundle.fallbackReason).toBeUndefined()
  })

  it('falls back to the full corpus when the index is empty', async () => {
    const retriever = new ContextRetriever(index, sources, OPTIONS)

    const bundle = await retriever.retrieve('anything')
    expect(bundle.mode).toBe('fallback_full')
    expect(bundle.fallbackReason).toBe('index returned no documents')
    expect(bundle.retrievedDocs.map((d) => d.docId)).toEqual(['kb:cache', 'kb:queues'])
    expect(bundle.retrievedDocs[0].content).toBe('# Cache eviction\n\nLRU evicts the least recently used entry.')
    expect(bundle.retrievedDocs.every((d) => d.score === null)).toBe(true)
  })

  it('falls back when the packed context is below the usable minimum', async () => {
    await new DocumentSyncer(index, sources).sync()
    const retriever = new ContextRetriever(index, sources, { ...OPTIONS, minUsableChars: 100_000 })

    const bundle = await retriever.retrieve('cache')
    expect(bundle.mode).toBe('fallback_full')
    expect(bundle.fallbackReason).toMatch(/^retrieved \d+ chars, below minimum 100000$/)
  })

  it('falls back when the index cannot embed the query', async () => {
    await new DocumentSyncer(index, sources).sync()
    embedder.failWhen = () => true
    const retriever = new ContextRetriever(index, sources, OPTIONS)

    const bundle = await retriever.retrieve('cache')
    expect(bundle.mode).toBe('fallback_full')
    expect(bundle.fallbackReason).toBe('index unavailable: embed:fake-embed failed: connection reset')
  })

  it('loads the corpus once until invalidated', async () => {
    const retriever = new ContextRetriever(index, sources, OPTIONS)
    await retriever.retrieve('q')
    await writeFile(join(dir, 'kb', 'new.md'), '# New\n\nFresh article.')

    const cached = await retriever.retrieve('q')
    expect(cached.retrievedDocs).toHaveLength(2)

    retriever.invalidateCorpus()
    const reloaded = await retriever.retrieve('q')
    expect(reloaded.retrievedDocs.map((d) => d.docId)).toEqual(['kb:cache', 'kb:new', 'kb:queues'])
  })

  it('searchDocuments returns metadata with scores', async () => {
    await new DocumentSyncer(index, sources).sync()
    const retriever = new ContextRetriever(index, sources, OPTIONS)

    const matches = await retriever.searchDocuments('message queues', 1)
    if (!matches.ok) throw matches.error
    expect(matches.value).toHaveLength(1)
    expect(matches.value[0].docId).toBe('kb:queues')
    expect(matches.value[0].title).toBe('Message queues')
  })
})
