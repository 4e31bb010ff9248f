/**
 * list command: indexed documents, optionally for one source.
 */

import { EXIT_OK, errorResult, parseFormat, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'
import { formatDocumentList, formatJson } from '../utils/output.js'

export interface ListCommandOptions {
  source?: string
  format?: string
}

export async function executeList(options: ListCommandOptions, ctx: CommandContext = {}): Promise<CommandResult> {
  const format = parseFormat(options.format)
  if (!format.ok) return errorResult(format.error)

  return withKnowledgeBase(ctx, async (kb) => {
    const docs = await kb.index.listBySource(options.source)
    if (!docs.ok) return errorResult(docs.error)
    return {
      output: format.value === 'json' ? formatJson(docs.value) : formatDocumentList(docs.value),
      exitCode: EXIT_OK,
    }
  })
}
