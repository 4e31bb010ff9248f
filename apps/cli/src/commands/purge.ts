/**
 * purge command: remove every document of one source from the index.
 */

import { EXIT_OK, errorResult, failure, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'

export interface PurgeCommandOptions {
  source?: string
}

export async function executePurge(options: PurgeCommandOptions, ctx: CommandContext = {}): Promise<CommandResult> {
  const source = options.source?.trim()
  if (!source) return failure('--source is required')

  return withKnowledgeBase(ctx, async (kb) => {
    const purged = await kb.index.purgeSource(source)
    if (!purged.ok) return errorResult(purged.error)
    return { output: `Purged ${purged.value} document(s) from ${source}`, exitCode: EXIT_OK }
  })
}
