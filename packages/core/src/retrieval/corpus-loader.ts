/**
 * Full-corpus loader for fallback retrieval: every document every configured
 * source currently holds, read from disk with frontmatter stripped.
 */

import type { SourceDocument } from '../kb/index.js'
import { stripFrontmatter } from '../sync/index.js'
import type { DocumentSource } from '../sync/index.js'

export interface CorpusDocument extends SourceDocument {
  indexedAt: string
}

export async function loadCorpus(sources: DocumentSource[]): Promise<CorpusDocument[]> {
  const loadedAt = new Date().toISOString()
  const docs: CorpusDocument[] = []

  for (const source of sources) {
    const entries = await source.enumerate({ indexed: new Map(), force: true })
    if (!entries.ok) {
      console.warn(`[retrieval] corpus source ${source.source} unavailable: ${entries.error.message}`)
      continue
    }
    for (const entry of entries.value) {
      if (entry.kind !== 'document') continue
      const content = stripFrontmatter(entry.doc.content).trim()
      if (!content) continue
      docs.push({ ...entry.doc, content, charCount: content.length, indexedAt: loadedAt })
    }
  }

  console.log(`[retrieval] loaded full corpus: ${docs.length} document(s) from ${sources.length} source(s)`)
  return docs
}
