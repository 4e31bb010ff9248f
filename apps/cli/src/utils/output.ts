/**
 * Text renderings of core reports. JSON output is the report itself.
 */

import type { BatchReport, Document, DocumentMatch, IndexStats, SyncReport } from '@kbforge/core'

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2)
}

export function formatSyncReport(report: SyncReport): string {
  const lines = [
    `Sync: ${report.upserted} upserted, ${report.deleted} deleted, ${report.unchanged} unchanged, ` +
      `${report.skipped.length} skipped, ${report.failures.length} failed (${report.durationMs}ms)`,
  ]
  for (const [source, r] of Object.entries(report.perSource)) {
    const state = r.failed ? ' [FAILED]' : ''
    lines.push(`  ${source}: +${r.upserted} -${r.deleted} =${r.unchanged} skipped ${r.skipped}${state}`)
  }
  for (const s of report.skipped) {
    lines.push(`  skipped ${s.docId ?? s.source}: ${s.reason}`)
  }
  for (const f of report.failures) {
    lines.push(`  failed ${f.docId ?? f.source}: [${f.code}] ${f.message}`)
  }
  return lines.join('\n')
}

export function formatDocumentList(docs: Document[]): string {
  if (docs.length === 0) return 'No documents indexed.'
  const lines = docs.map((d) => `${d.docId}\t${d.title}\t${d.charCount} chars\t${d.indexedAt}`)
  lines.push(`${docs.length} document(s)`)
  return lines.join('\n')
}

export function formatStats(stats: IndexStats): string {
  const lines = [
    `Documents: ${stats.totalDocuments}`,
    `Characters: ${stats.totalChars}`,
    `Dimensions: ${stats.dimensions ?? '-'}`,
    `Last indexed: ${stats.lastIndexedAt ?? 'never'}`,
    `Embedding models: ${stats.embeddingModels.join(', ') || '-'}`,
  ]
  const sources = Object.entries(stats.bySource)
  if (sources.length > 0) {
    lines.push('By source:')
    for (const [source, count] of sources) lines.push(`  ${source}: ${count}`)
  }
  return lines.join('\n')
}

export function formatMatches(query: string, matches: DocumentMatch[]): string {
  if (matches.length === 0) return `No results for "${query}".`
  const lines = [`${matches.length} result(s) for "${query}":`]
  matches.forEach((m, i) => {
    lines.push(`${i + 1}. ${m.docId} (${m.score.toFixed(3)}) ${m.title}`)
  })
  return lines.join('\n')
}

export function formatBatchReport(report: BatchReport): string {
  if (report.dryRun) {
    const lines = [`Dry run: ${report.plan?.length ?? 0} topic(s)`]
    for (const p of report.plan ?? []) {
      const subs = p.subtopics ? p.subtopics.join('; ') : '(derived at run time)'
      lines.push(`  ${p.slug}: ${p.topic} -> ${subs}`)
    }
    return lines.join('\n')
  }

  const lines = [
    `Batch: ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped ` +
      `of ${report.total} (${report.durationMs}ms)${report.cancelled ? ' [cancelled]' : ''}`,
  ]
  for (const r of report.results) {
    if (r.status === 'succeeded') {
      const review = r.lowConfidenceCount > 0 || r.failedSubsections.length > 0 ? ' (review recommended)' : ''
      lines.push(`  ok      ${r.topic} -> ${r.articlePath ?? '(not saved)'}${review}`)
    } else if (r.status === 'failed') {
      lines.push(`  failed  ${r.topic} at ${r.stage}: [${r.error.code}] ${r.error.message}`)
      for (const issue of r.issues) lines.push(`          ${issue}`)
    } else {
      lines.push(`  skipped ${r.topic}: ${r.reason}`)
    }
  }
  if (report.reindex) {
    lines.push(`Re-index: ${report.reindex.upserted} upserted, ${report.reindex.deleted} deleted`)
  }
  return lines.join('\n')
}
