/**
 * Zod schemas and types for indexed documents.
 */

import { z } from 'zod'
import { SourceNameSchema, TimestampSchema } from '../common/index.js'

/** Built-in sources; markdown sources may declare any other valid source name. */
export const BUILTIN_SOURCES = ['kb', 'questions', 'blindspots', 'wiki'] as const
export type BuiltinSource = (typeof BUILTIN_SOURCES)[number]

export const DocIdSchema = z.string().regex(/^[a-z0-9][a-z0-9-]*:.+$/, 'doc_id must be "<source>:<slug>"')

export const DocumentSchema = z.object({
  docId: DocIdSchema,
  source: SourceNameSchema,
  title: z.string().min(1),
  content: z.string(),
  contentHash: z.string().min(1),
  indexedAt: TimestampSchema,
  charCount: z.number().int().nonnegative(),
  metadata: z.record(z.string()),
})

export type Document = z.infer<typeof DocumentSchema>

/** A document as enumerated from a source, before it is indexed. */
export type SourceDocument = Omit<Document, 'indexedAt'>

export interface IndexRecord extends Document {
  embedding: Float32Array
  embeddingModel: string
}

export interface SearchHit extends Document {
  /** Cosine similarity to the query vector. */
  score: number
}

export interface DocumentFilter {
  source?: string
}

export interface IndexStats {
  totalDocuments: number
  bySource: Record<string, number>
  totalChars: number
  dimensions: number | null
  lastIndexedAt: string | null
  /** Fingerprints of the embedders that produced the stored vectors. */
  embeddingModels: string[]
}

export function docIdFor(source: string, slug: string): string {
  return `${source}:${slug}`
}

/** Split a doc id into its source prefix and slug. */
export function parseDocId(docId: string): { source: string; slug: string } | null {
  const idx = docId.indexOf(':')
  if (idx <= 0 || idx === docId.length - 1) return null
  return { source: docId.slice(0, idx), slug: docId.slice(idx + 1) }
}
