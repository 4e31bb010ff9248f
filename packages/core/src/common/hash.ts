/**
 * Content hashing and slug helpers shared by the syncer and the article writer.
 */

import { createHash } from 'node:crypto'

/** SHA-256 hex digest of document text. */
export function computeContentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/** Lowercase, hyphen-separated slug: "Event Sourcing & CQRS" → "event-sourcing-cqrs". */
export function titleToSlug(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
}
