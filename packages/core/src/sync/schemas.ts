/**
 * Sync plan and report types.
 */

import type { ErrorCode } from '../common/index.js'
import type { SourceDocument } from '../kb/index.js'

/** Derived per source on every sync; never persisted. */
export interface SyncPlan {
  toUpsert: SourceDocument[]
  toDelete: string[]
  unchanged: number
}

export interface SkippedUnit {
  source: string
  docId?: string
  reason: string
}

export interface SyncFailure {
  source: string
  docId?: string
  code: ErrorCode
  message: string
}

export interface SourceSyncReport {
  upserted: number
  deleted: number
  unchanged: number
  skipped: number
  /** The source could not be enumerated; its records were left untouched. */
  failed: boolean
  durationMs: number
}

export interface SyncReport {
  upserted: number
  deleted: number
  unchanged: number
  skipped: SkippedUnit[]
  failures: SyncFailure[]
  perSource: Record<string, SourceSyncReport>
  durationMs: number
}

export interface SyncOptions {
  /** Restrict to these source names; all configured sources when omitted. */
  sources?: string[]
  /** Rehash and re-upsert every document, bypassing the mtime pre-filter. */
  force?: boolean
  signal?: AbortSignal
}
