/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const TimestampSchema = z.string().datetime()

export const FilePathSchema = z.string().min(1, 'File path cannot be empty')

/** Source names become the prefix of every doc_id, so they stay slug-like. */
export const SourceNameSchema = z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'Source name must be a lowercase slug')
