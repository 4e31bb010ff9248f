/**
 * ContextBundle: the context handed to one generation call.
 *
 * RAG and fallback bundles share one shape; `mode` tells them apart and
 * callers only read it for logging.
 */

import type { Document } from '../kb/index.js'

export type RetrievalMode = 'rag' | 'fallback_full'

export interface RetrievedDocument extends Document {
  /** Cosine similarity; null for full-corpus documents. */
  score: number | null
  /** Content was cut to fit the character budget. */
  truncated: boolean
}

export interface ContextBundle {
  query: string
  mode: RetrievalMode
  /** Rank order for RAG, corpus order for fallback. */
  retrievedDocs: RetrievedDocument[]
  /** Sum of packed content characters. */
  totalChars: number
  truncated: boolean
  /** Why retrieval fell back to the full corpus. */
  fallbackReason?: string
}

export const TRUNCATION_MARKER = '\n...[TRUNCATED]'

/** Smallest remainder worth packing as a partial document. */
const MIN_PARTIAL_CHARS = 50

export interface PackResult {
  docs: RetrievedDocument[]
  totalChars: number
  truncated: boolean
}

/**
 * Pack documents in the given order until `charBudget` content characters.
 * The document that crosses the budget is cut and marked; packing stops there.
 */
export function packDocuments(
  candidates: Array<Document & { score: number | null }>,
  charBudget: number,
): PackResult {
  const docs: RetrievedDocument[] = []
  let totalChars = 0

  for (const candidate of candidates) {
    if (totalChars + candidate.content.length > charBudget) {
      const remaining = charBudget - totalChars - TRUNCATION_MARKER.length
      if (remaining > MIN_PARTIAL_CHARS) {
        const content = candidate.content.slice(0, remaining) + TRUNCATION_MARKER
        docs.push({ ...candidate, content, truncated: true })
        totalChars += content.length
      }
      return { docs, totalChars, truncated: true }
    }
    docs.push({ ...candidate, truncated: false })
    totalChars += candidate.content.length
  }

  return { docs, totalChars, truncated: false }
}

/** Render as `--- Document: <doc_id> ---` blocks for a prompt. */
export function renderContext(bundle: Pick<ContextBundle, 'retrievedDocs'>): string {
  return bundle.retrievedDocs
    .map((doc) => `--- Document: ${doc.docId} ---\n${doc.content}`)
    .join('\n\n')
}
