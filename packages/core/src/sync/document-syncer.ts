/**
 * DocumentSyncer: keeps the EmbeddingIndex consistent with the configured sources.
 *
 * Per source: list indexed records → enumerate current documents → build a
 * SyncPlan by content hash → apply deletes, then upserts. A source that cannot
 * be enumerated is reported and left untouched; a document that fails to parse
 * or embed is skipped with a warning and picked up again on the next sync,
 * since no hash was recorded for it.
 */

import { errorMessage } from '../common/index.js'
import type { KBForgeError } from '../common/index.js'
import type { Document, EmbeddingIndex } from '../kb/index.js'
import type { DocumentSource, SourceEntry } from './sources.js'
import type { SkippedUnit, SourceSyncReport, SyncOptions, SyncPlan, SyncReport } from './schemas.js'

export interface SyncPlanResult {
  plan: SyncPlan
  skipped: SkippedUnit[]
}

/**
 * Diff enumerated entries against indexed records.
 * Orphans are indexed ids with no entry at all; ids (and id prefixes) of entries
 * that failed to parse are kept, so a transient parse failure never deletes a record.
 */
export function buildSyncPlan(
  source: string,
  entries: SourceEntry[],
  indexed: ReadonlyMap<string, Document>,
  force: boolean,
): SyncPlanResult {
  const seen = new Set<string>()
  const keptPrefixes: string[] = []
  const plan: SyncPlan = { toUpsert: [], toDelete: [], unchanged: 0 }
  const skipped: SkippedUnit[] = []

  for (const entry of entries) {
    switch (entry.kind) {
      case 'unchanged':
        seen.add(entry.docId)
        plan.unchanged++
        break
      case 'invalid':
        if (entry.docId) seen.add(entry.docId)
        if (entry.docIdPrefix) keptPrefixes.push(entry.docIdPrefix)
        skipped.push({ source, docId: entry.docId, reason: entry.error.message })
        break
      case 'document': {
        const { doc } = entry
        if (seen.has(doc.docId)) {
          skipped.push({ source, docId: doc.docId, reason: 'duplicate doc_id' })
          break
        }
        seen.add(doc.docId)
        const record = indexed.get(doc.docId)
        if (!force && record && record.contentHash === doc.contentHash) {
          plan.unchanged++
        } else {
          plan.toUpsert.push(doc)
        }
        break
      }
    }
  }

  for (const docId of indexed.keys()) {
    if (seen.has(docId) || keptPrefixes.some((prefix) => docId.startsWith(prefix))) continue
    plan.toDelete.push(docId)
  }

  return { plan, skipped }
}

function emptySourceReport(): SourceSyncReport {
  return { upserted: 0, deleted: 0, unchanged: 0, skipped: 0, failed: false, durationMs: 0 }
}

export class DocumentSyncer {
  constructor(
    private readonly index: EmbeddingIndex,
    private readonly sources: DocumentSource[],
  ) {}

  get sourceNames(): string[] {
    return this.sources.map((s) => s.source)
  }

  async sync(options: SyncOptions = {}): Promise<SyncReport> {
    const startTime = Date.now()
    const force = options.force ?? false
    const report: SyncReport = {
      upserted: 0,
      deleted: 0,
      unchanged: 0,
      skipped: [],
      failures: [],
      perSource: {},
      durationMs: 0,
    }

    const wanted = options.sources
    if (wanted) {
      for (const name of wanted) {
        if (!this.sourceNames.includes(name)) {
          report.failures.push({ source: name, code: 'NOT_FOUND', message: `Unknown source "${name}"` })
        }
      }
    }

    for (const source of this.sources) {
      if (wanted && !wanted.includes(source.source)) continue
      if (options.signal?.aborted) {
        report.skipped.push({ source: source.source, reason: 'cancelled' })
        continue
      }
      const sourceReport = await this.syncSource(source, force, report, options.signal)
      report.perSource[source.source] = sourceReport
      report.upserted += sourceReport.upserted
      report.deleted += sourceReport.deleted
      report.unchanged += sourceReport.unchanged
    }

    report.durationMs = Date.now() - startTime
    console.log(
      `[sync] done${force ? ' (force)' : ''}: ${report.upserted} upserted, ${report.deleted} deleted, ` +
      `${report.unchanged} unchanged, ${report.skipped.length} skipped, ${report.failures.length} failed in ${report.durationMs}ms`,
    )
    return report
  }

  private async syncSource(
    source: DocumentSource,
    force: boolean,
    report: SyncReport,
    signal: AbortSignal | undefined,
  ): Promise<SourceSyncReport> {
    const startTime = Date.now()
    const result = emptySourceReport()
    const fail = (error: KBForgeError, docId?: string): void => {
      report.failures.push({ source: source.source, docId, code: error.code, message: error.message })
    }

    const listed = await this.index.listBySource(source.source)
    if (!listed.ok) {
      console.error(`[sync] ${source.source}: cannot read index: ${listed.error.message}`)
      fail(listed.error)
      result.failed = true
      result.durationMs = Date.now() - startTime
      return result
    }
    const indexed = new Map(listed.value.map((doc) => [doc.docId, doc]))

    const enumerated = await source.enumerate({ indexed, force })
    if (!enumerated.ok) {
      console.error(`[sync] ${source.source}: ${enumerated.error.message}; index left untouched`)
      fail(enumerated.error)
      result.failed = true
      result.durationMs = Date.now() - startTime
      return result
    }

    const { plan, skipped } = buildSyncPlan(source.source, enumerated.value, indexed, force)
    for (const unit of skipped) {
      console.warn(`[sync] skipped ${unit.docId ?? source.source}: ${unit.reason}`)
    }
    report.skipped.push(...skipped)
    result.skipped += skipped.length
    result.unchanged = plan.unchanged

    // Deletes first, so an id is never live twice.
    for (const docId of plan.toDelete) {
      const deleted = await this.index.deleteDocument(docId)
      if (deleted.ok) {
        result.deleted++
      } else {
        console.error(`[sync] delete ${docId} failed: ${deleted.error.message}`)
        fail(deleted.error, docId)
      }
    }

    for (const doc of plan.toUpsert) {
      if (signal?.aborted) {
        report.skipped.push({ source: source.source, docId: doc.docId, reason: 'cancelled' })
        result.skipped++
        continue
      }
      const upserted = await this.index.upsertDocument(doc, signal)
      if (upserted.ok) {
        result.upserted++
      } else if (upserted.error.code === 'CAPABILITY_ERROR') {
        console.warn(`[sync] skipped ${doc.docId}: embedding failed: ${upserted.error.message}`)
        report.skipped.push({ source: source.source, docId: doc.docId, reason: `embedding failed: ${upserted.error.message}` })
        result.skipped++
      } else {
        console.error(`[sync] upsert ${doc.docId} failed: ${upserted.error.message}`)
        fail(upserted.error, doc.docId)
      }
    }

    result.durationMs = Date.now() - startTime
    console.log(
      `[sync] ${source.source}: ${result.upserted} upserted, ${result.deleted} deleted, ${result.unchanged} unchanged, ${result.skipped} skipped`,
    )
    return result
  }

  /**
   * True when the index is empty or any source file changed after the most
   * recent indexed_at. An unreadable index or source counts as stale.
   */
  async isStale(): Promise<boolean> {
    const docs = await this.index.listBySource()
    if (!docs.ok) {
      console.warn(`[sync] staleness check failed: ${docs.error.message}`)
      return true
    }
    if (docs.value.length === 0) {
      console.log('[sync] no documents indexed yet, sync needed')
      return true
    }

    const latestIndexed = Math.max(...docs.value.map((d) => Date.parse(d.indexedAt)).filter((t) => !Number.isNaN(t)))
    if (!Number.isFinite(latestIndexed)) return true

    for (const source of this.sources) {
      const modified = await source.lastModifiedMs()
      if (!modified.ok) {
        console.warn(`[sync] staleness check: ${errorMessage(modified.error)}`)
        return true
      }
      if (modified.value > latestIndexed) {
        console.log(`[sync] stale: ${source.source} modified after last sync`)
        return true
      }
    }
    return false
  }

  /** Incremental sync only when isStale(); null when the index is current. */
  async syncIfNeeded(options: Omit<SyncOptions, 'force'> = {}): Promise<SyncReport | null> {
    if (!(await this.isStale())) {
      console.log('[sync] documents up-to-date')
      return null
    }
    return this.sync(options)
  }
}
