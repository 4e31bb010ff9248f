/**
 * delete command: remove one document from the index.
 */

import { KBForgeError } from '@kbforge/core'
import { EXIT_OK, errorResult, failure, withKnowledgeBase } from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'

export interface DeleteCommandOptions {
  docId?: string
}

export async function executeDelete(options: DeleteCommandOptions, ctx: CommandContext = {}): Promise<CommandResult> {
  const docId = options.docId?.trim()
  if (!docId) return failure('--doc-id is required')

  return withKnowledgeBase(ctx, async (kb) => {
    const deleted = await kb.index.deleteDocument(docId)
    if (!deleted.ok) return errorResult(deleted.error)
    if (!deleted.value) return errorResult(KBForgeError.notFound('Document', docId))
    return { output: `Deleted ${docId}`, exitCode: EXIT_OK }
  })
}
