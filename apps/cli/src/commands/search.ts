/**
 * search command: top-K documents for a query by similarity.
 */

import { EXIT_OK, errorResult, failure, parseFormat, parsePositiveInt, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'
import { formatJson, formatMatches } from '../utils/output.js'

export interface SearchCommandOptions {
  topK?: string
  format?: string
}

export async function executeSearch(
  query: string,
  options: SearchCommandOptions,
  ctx: CommandContext = {},
): Promise<CommandResult> {
  if (!query.trim()) return failure('a search query is required')
  const format = parseFormat(options.format)
  if (!format.ok) return errorResult(format.error)
  const topK = parsePositiveInt(options.topK, '--top-k')
  if (!topK.ok) return errorResult(topK.error)

  return withKnowledgeBase(ctx, async (kb, config) => {
    const matches = await kb.retriever.searchDocuments(query, topK.value ?? config.retrieval.topK)
    if (!matches.ok) return errorResult(matches.error)
    return {
      output: format.value === 'json' ? formatJson(matches.value) : formatMatches(query, matches.value),
      exitCode: EXIT_OK,
    }
  })
}
