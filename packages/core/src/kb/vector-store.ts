/**
 * Vector store capability: persistence and nearest-neighbour search over
 * IndexRecords. Every operation except search is idempotent.
 */

import type { Result } from '../common/index.js'
import type { KBForgeError } from '../common/index.js'
import type { Document, DocumentFilter, IndexRecord, IndexStats, SearchHit } from './schemas.js'

export interface VectorStore {
  /** Insert or replace the record for `record.docId`. An existing id keeps its insertion order. */
  upsert(record: IndexRecord): Promise<Result<void, KBForgeError>>
  /** Top-K by cosine similarity, highest first; ties in insertion order. */
  search(vector: ArrayLike<number>, topK: number, filter?: DocumentFilter): Promise<Result<SearchHit[], KBForgeError>>
  /** Returns whether a record was removed. */
  delete(docId: string): Promise<Result<boolean, KBForgeError>>
  /** Records in insertion order. */
  list(filter?: DocumentFilter): Promise<Result<Document[], KBForgeError>>
  get(docId: string): Promise<Result<Document | null, KBForgeError>>
  stats(): Promise<Result<IndexStats, KBForgeError>>
}
