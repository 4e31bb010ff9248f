/**
 * Configuration loading: JSON file + environment overrides, validated by zod.
 *
 * Resolution order for the file: explicit path, KBFORGE_CONFIG, then
 * ./kbforge.config.json. A missing default file yields the defaults; a missing
 * explicit file is a CONFIGURATION_ERROR. Relative paths in the file resolve
 * against the file's directory.
 */

import { readFile } from 'node:fs/promises'
import { dirname, isAbsolute, resolve } from 'node:path'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KBForgeError, errorMessage } from '../common/index.js'
import { AppConfigSchema } from './schemas.js'
import type { AppConfig, GenerationConfig, SourceConfig } from './schemas.js'

export const DEFAULT_CONFIG_FILE = 'kbforge.config.json'

export interface LoadConfigOptions {
  configPath?: string
  cwd?: string
  env?: Record<string, string | undefined>
}

export interface LoadedConfig {
  config: AppConfig
  configPath: string | null
  baseDir: string
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Result<LoadedConfig, KBForgeError>> {
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env
  const explicit = options.configPath ?? env.KBFORGE_CONFIG
  const configPath = resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE)

  let raw: unknown = {}
  let found = true
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'))
  } catch (err) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined
    if (code === 'ENOENT' && !explicit) {
      found = false
    } else if (code === 'ENOENT') {
      return Err(KBForgeError.configuration(`Config file not found: ${configPath}`))
    } else {
      return Err(KBForgeError.configuration(`Failed to read config ${configPath}: ${errorMessage(err)}`))
    }
  }

  const parsed = AppConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    return Err(KBForgeError.configuration(`Invalid configuration: ${issues}`))
  }

  const baseDir = found ? dirname(configPath) : cwd
  const config = applyEnvOverrides(resolvePaths(parsed.data, baseDir), env)
  return Ok({ config, configPath: found ? configPath : null, baseDir })
}

function resolvePaths(config: AppConfig, baseDir: string): AppConfig {
  const abs = (p: string): string => (p === ':memory:' || isAbsolute(p) ? p : resolve(baseDir, p))
  return {
    ...config,
    index: { ...config.index, dbPath: abs(config.index.dbPath) },
    sources: config.sources.map((s): SourceConfig => ({ ...s, path: abs(s.path) })),
    batch: { ...config.batch, outputDir: abs(config.batch.outputDir) },
  }
}

function keyFromEnv(provider: string, env: Record<string, string | undefined>): string | undefined {
  if (provider === 'anthropic') return env.ANTHROPIC_API_KEY?.trim() || undefined
  if (provider === 'openai') return env.OPENAI_API_KEY?.trim() || undefined
  return undefined
}

function withEnvKey(gen: GenerationConfig, env: Record<string, string | undefined>): GenerationConfig {
  return {
    ...gen,
    apiKey: gen.apiKey?.trim() || keyFromEnv(gen.provider, env),
    ollamaBaseUrl: gen.ollamaBaseUrl ?? env.OLLAMA_BASE_URL,
  }
}

export function applyEnvOverrides(config: AppConfig, env: Record<string, string | undefined>): AppConfig {
  return {
    ...config,
    generation: withEnvKey(config.generation, env),
    evaluation: config.evaluation ? withEnvKey(config.evaluation, env) : undefined,
    embedding: {
      ...config.embedding,
      apiKey: config.embedding.apiKey?.trim() || keyFromEnv(config.embedding.provider, env),
      ollamaBaseUrl: config.embedding.ollamaBaseUrl ?? env.OLLAMA_BASE_URL,
    },
    index: { ...config.index, dbPath: env.KBFORGE_DB_PATH ?? config.index.dbPath },
  }
}

export type Capability = 'generation' | 'evaluation' | 'embedding' | 'sources'

/**
 * Fail fast before any capability call when a needed credential or path is missing.
 * Throws CONFIGURATION_ERROR listing every problem found.
 */
export function requireCapabilities(config: AppConfig, needs: Capability[]): void {
  const problems: string[] = []
  const needsKey = (gen: GenerationConfig, label: string): void => {
    if (gen.provider !== 'ollama' && !gen.apiKey) {
      problems.push(`${label}: ${gen.provider} API key is not configured`)
    }
  }

  if (needs.includes('generation')) needsKey(config.generation, 'generation')
  if (needs.includes('evaluation')) needsKey(config.evaluation ?? config.generation, 'evaluation')
  if (needs.includes('embedding') && config.embedding.provider === 'openai' && !config.embedding.apiKey) {
    problems.push('embedding: openai API key is not configured')
  }
  if (needs.includes('sources') && config.sources.length === 0) {
    problems.push('sources: no document sources configured')
  }

  if (problems.length > 0) {
    throw KBForgeError.configuration(problems.join('; '))
  }
}
