/**
 * status command: whether a sync is needed, plus per-source document counts.
 */

import { EXIT_OK, errorResult, parseFormat, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'
import { formatJson } from '../utils/output.js'

export interface StatusCommandOptions {
  format?: string
}

export interface StatusReport {
  stale: boolean
  lastIndexedAt: string | null
  embeddingModel: string
  /** Stored vectors came from another embedder; `sync --force` re-embeds them. */
  modelMismatch: boolean
  sources: Array<{ source: string; kind: string; path: string; documents: number }>
}

export async function executeStatus(options: StatusCommandOptions, ctx: CommandContext = {}): Promise<CommandResult> {
  const format = parseFormat(options.format)
  if (!format.ok) return errorResult(format.error)

  return withKnowledgeBase(ctx, async (kb) => {
    const stats = await kb.index.stats()
    if (!stats.ok) return errorResult(stats.error)

    const report: StatusReport = {
      stale: await kb.syncer.isStale(),
      lastIndexedAt: stats.value.lastIndexedAt,
      embeddingModel: kb.index.embeddingModel,
      modelMismatch: stats.value.embeddingModels.some((m) => m !== kb.index.embeddingModel),
      sources: kb.sources.map((s) => ({
        source: s.source,
        kind: s.kind,
        path: s.path,
        documents: stats.value.bySource[s.source] ?? 0,
      })),
    }

    if (format.value === 'json') return { output: formatJson(report), exitCode: EXIT_OK }

    const lines = [
      `Index: ${report.stale ? 'stale, run "kbforge sync"' : 'up to date'}`,
      `Last indexed: ${report.lastIndexedAt ?? 'never'}`,
      `Embedding model: ${report.embeddingModel}`,
      ...(report.modelMismatch ? ['Warning: index holds vectors from another embedding model, run "kbforge sync --force"'] : []),
      ...report.sources.map((s) => `  ${s.source} (${s.kind}) ${s.path}: ${s.documents} document(s)`),
    ]
    return { output: lines.join('\n'), exitCode: EXIT_OK }
  })
}
