/**
 * Shared command plumbing: config resolution and the knowledge-base lifecycle.
 */

import { Ok, Err, KBForgeError, errorMessage, loadConfig, openKnowledgeBase } from '@kbforge/core'
import type {
  AppConfig,
  EmbeddingClient,
  KnowledgeBase,
  Result,
  TextGenerator,
} from '@kbforge/core'

export interface CommandContext {
  configPath?: string
  cwd?: string
  env?: Record<string, string | undefined>
  /** Capability stand-ins, used by tests. */
  embedder?: EmbeddingClient
  generator?: TextGenerator
  evaluator?: TextGenerator
}

export interface CommandResult {
  output: string
  exitCode: number
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1

export type OutputFormat = 'text' | 'json'

export function failure(message: string): CommandResult {
  return { output: `Error: ${message}`, exitCode: EXIT_FAILURE }
}

export function errorResult(error: KBForgeError): CommandResult {
  return failure(`[${error.code}] ${error.message}`)
}

export async function resolveConfig(ctx: CommandContext): Promise<Result<AppConfig, KBForgeError>> {
  const loaded = await loadConfig({ configPath: ctx.configPath, cwd: ctx.cwd, env: ctx.env })
  if (!loaded.ok) return loaded
  return Ok(loaded.value.config)
}

/** Opens the knowledge base, runs `fn`, and always closes the database. */
export async function withKnowledgeBase(
  ctx: CommandContext,
  fn: (kb: KnowledgeBase, config: AppConfig) => Promise<CommandResult>,
): Promise<CommandResult> {
  const config = await resolveConfig(ctx)
  if (!config.ok) return errorResult(config.error)

  let kb: KnowledgeBase
  try {
    kb = openKnowledgeBase(config.value, { embedder: ctx.embedder })
  } catch (e) {
    return errorResult(e instanceof KBForgeError ? e : KBForgeError.io(errorMessage(e)))
  }

  try {
    return await fn(kb, config.value)
  } catch (e) {
    if (e instanceof KBForgeError) return errorResult(e)
    throw e
  } finally {
    kb.close()
  }
}

export function parsePositiveInt(raw: string | undefined, name: string): Result<number | undefined, KBForgeError> {
  if (raw === undefined) return Ok(undefined)
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 1) {
    return Err(KBForgeError.validation(`${name} must be a positive integer, got "${raw}"`))
  }
  return Ok(n)
}

export function parseFormat(raw: string | undefined): Result<OutputFormat, KBForgeError> {
  if (raw === undefined || raw === 'text') return Ok<OutputFormat>('text')
  if (raw === 'json') return Ok<OutputFormat>('json')
  return Err(KBForgeError.validation(`--format must be text or json, got "${raw}"`))
}
