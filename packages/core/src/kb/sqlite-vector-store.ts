/**
 * SQLite-backed VectorStore. One row per doc_id; embeddings stored as
 * little-endian Float32 blobs and scanned in process for search.
 * Follows the repository pattern: constructor(db), methods return Result<T>.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KBForgeError, errorMessage } from '../common/index.js'
import type { Document, DocumentFilter, IndexRecord, IndexStats, SearchHit } from './schemas.js'
import type { VectorStore } from './vector-store.js'
import { packFloat32, rankBySimilarity, unpackFloat32 } from './vector-search.js'
import type { RankCandidate } from './vector-search.js'

interface RecordRow {
  seq: number
  doc_id: string
  source: string
  title: string
  content: string
  content_hash: string
  indexed_at: string
  char_count: number
  metadata: string
}

interface VectorRow extends RecordRow {
  dimensions: number
  embedding: Buffer
}

const MetadataSchema = z.record(z.string())

const RECORD_COLUMNS = 'seq, doc_id, source, title, content, content_hash, indexed_at, char_count, metadata'

function parseMetadata(raw: string, docId: string): Record<string, string> {
  try {
    const parsed = MetadataSchema.safeParse(JSON.parse(raw))
    if (parsed.success) return parsed.data
  } catch (e) {
    console.warn(`[index] unreadable metadata for ${docId}: ${errorMessage(e)}`)
    return {}
  }
  console.warn(`[index] metadata for ${docId} is not a string map`)
  return {}
}

function rowToDocument(row: RecordRow): Document {
  return {
    docId: row.doc_id,
    source: row.source,
    title: row.title,
    content: row.content,
    contentHash: row.content_hash,
    indexedAt: row.indexed_at,
    charCount: row.char_count,
    metadata: parseMetadata(row.metadata, row.doc_id),
  }
}

export class SqliteVectorStore implements VectorStore {
  constructor(private readonly db: Database.Database) {}

  async upsert(record: IndexRecord): Promise<Result<void, KBForgeError>> {
    try {
      this.db
        .prepare(
          `INSERT INTO index_records
             (doc_id, source, title, content, content_hash, indexed_at, char_count, metadata, dimensions, embedding, embedding_model)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(doc_id) DO UPDATE SET
             source = excluded.source,
             title = excluded.title,
             content = excluded.content,
             content_hash = excluded.content_hash,
             indexed_at = excluded.indexed_at,
             char_count = excluded.char_count,
             metadata = excluded.metadata,
             dimensions = excluded.dimensions,
             embedding = excluded.embedding,
             embedding_model = excluded.embedding_model`,
        )
        .run(
          record.docId,
          record.source,
          record.title,
          record.content,
          record.contentHash,
          record.indexedAt,
          record.charCount,
          JSON.stringify(record.metadata),
          record.embedding.length,
          packFloat32(record.embedding),
          record.embeddingModel,
        )
      return Ok(undefined)
    } catch (e) {
      return Err(KBForgeError.db(`upsert ${record.docId}: ${errorMessage(e)}`))
    }
  }

  async search(vector: ArrayLike<number>, topK: number, filter: DocumentFilter = {}): Promise<Result<SearchHit[], KBForgeError>> {
    try {
      const rows = filter.source
        ? this.db
          .prepare<[string], VectorRow>(`SELECT ${RECORD_COLUMNS}, dimensions, embedding FROM index_records WHERE source = ? ORDER BY seq`)
          .all(filter.source)
        : this.db
          .prepare<[], VectorRow>(`SELECT ${RECORD_COLUMNS}, dimensions, embedding FROM index_records ORDER BY seq`)
          .all()

      const candidates: RankCandidate<VectorRow>[] = []
      for (const row of rows) {
        const embedding = unpackFloat32(row.embedding, row.dimensions)
        if (!embedding) continue
        candidates.push({ item: row, vector: embedding, seq: row.seq })
      }

      const ranked = rankBySimilarity(vector, candidates, topK)
      return Ok(ranked.map(({ item, score }) => ({ ...rowToDocument(item), score })))
    } catch (e) {
      return Err(KBForgeError.db(`search: ${errorMessage(e)}`))
    }
  }

  async delete(docId: string): Promise<Result<boolean, KBForgeError>> {
    try {
      const info = this.db.prepare('DELETE FROM index_records WHERE doc_id = ?').run(docId)
      return Ok(info.changes > 0)
    } catch (e) {
      return Err(KBForgeError.db(`delete ${docId}: ${errorMessage(e)}`))
    }
  }

  async list(filter: DocumentFilter = {}): Promise<Result<Document[], KBForgeError>> {
    try {
      const rows = filter.source
        ? this.db
          .prepare<[string], RecordRow>(`SELECT ${RECORD_COLUMNS} FROM index_records WHERE source = ? ORDER BY seq`)
          .all(filter.source)
        : this.db
          .prepare<[], RecordRow>(`SELECT ${RECORD_COLUMNS} FROM index_records ORDER BY seq`)
          .all()
      return Ok(rows.map(rowToDocument))
    } catch (e) {
      return Err(KBForgeError.db(`list: ${errorMessage(e)}`))
    }
  }

  async get(docId: string): Promise<Result<Document | null, KBForgeError>> {
    try {
      const row = this.db
        .prepare<[string], RecordRow>(`SELECT ${RECORD_COLUMNS} FROM index_records WHERE doc_id = ?`)
        .get(docId)
      return Ok(row ? rowToDocument(row) : null)
    } catch (e) {
      return Err(KBForgeError.db(`get ${docId}: ${errorMessage(e)}`))
    }
  }

  async stats(): Promise<Result<IndexStats, KBForgeError>> {
    try {
      const bySourceRows = this.db
        .prepare<[], { source: string; count: number }>(
          'SELECT source, COUNT(*) as count FROM index_records GROUP BY source ORDER BY source',
        )
        .all()
      const totals = this.db
        .prepare<[], { total: number; chars: number | null; last: string | null; dims: number | null }>(
          'SELECT COUNT(*) as total, SUM(char_count) as chars, MAX(indexed_at) as last, MAX(dimensions) as dims FROM index_records',
        )
        .get()

      const models = this.db
        .prepare<[], { model: string }>(
          "SELECT DISTINCT embedding_model as model FROM index_records WHERE embedding_model != '' ORDER BY model",
        )
        .all()

      const bySource: Record<string, number> = {}
      for (const row of bySourceRows) bySource[row.source] = row.count

      return Ok({
        totalDocuments: totals?.total ?? 0,
        bySource,
        totalChars: totals?.chars ?? 0,
        dimensions: totals?.dims ?? null,
        lastIndexedAt: totals?.last ?? null,
        embeddingModels: models.map((m) => m.model),
      })
    } catch (e) {
      return Err(KBForgeError.db(`stats: ${errorMessage(e)}`))
    }
  }
}
