/**
 * stats command: index totals.
 */

import { EXIT_OK, errorResult, parseFormat, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'
import { formatJson, formatStats } from '../utils/output.js'

export interface StatsCommandOptions {
  format?: string
}

export async function executeStats(options: StatsCommandOptions, ctx: CommandContext = {}): Promise<CommandResult> {
  const format = parseFormat(options.format)
  if (!format.ok) return errorResult(format.error)

  return withKnowledgeBase(ctx, async (kb) => {
    const stats = await kb.index.stats()
    if (!stats.ok) return errorResult(stats.error)
    return {
      output: format.value === 'json' ? formatJson(stats.value) : formatStats(stats.value),
      exitCode: EXIT_OK,
    }
  })
}
