/**
 * sync command: incremental (or forced) sync of configured sources into the index.
 */

import { EXIT_FAILURE, EXIT_OK, errorResult, parseFormat, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'
import { formatJson, formatSyncReport } from '../utils/output.js'

export interface SyncCommandOptions {
  force?: boolean
  source?: string[]
  format?: string
}

export async function executeSync(options: SyncCommandOptions, ctx: CommandContext = {}): Promise<CommandResult> {
  const format = parseFormat(options.format)
  if (!format.ok) return errorResult(format.error)

  return withKnowledgeBase(ctx, async (kb) => {
    const report = await kb.syncer.sync({ force: options.force ?? false, sources: options.source })
    const sourceFailed = Object.values(report.perSource).some((r) => r.failed)
    return {
      output: format.value === 'json' ? formatJson(report) : formatSyncReport(report),
      exitCode: report.failures.length > 0 || sourceFailed ? EXIT_FAILURE : EXIT_OK,
    }
  })
}
