/**
 * Ollama provider: local LLMs via the OpenAI-compatible API at ${base}/v1.
 */

import { KBForgeError } from '../common/index.js'
import { OpenAIProvider } from './openai-provider.js'

export interface OllamaProviderOptions {
  model: string
  baseUrl?: string
  maxTokens?: number
}

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434'

/** Base URL without trailing slashes or a /v1 suffix. Throws CONFIGURATION_ERROR for non-http(s) URLs. */
export function normalizeOllamaUrl(url: string): string {
  let normalized = url.trim().replace(/\/+$/, '')
  if (normalized.endsWith('/v1')) {
    normalized = normalized.slice(0, -3)
  }
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    throw KBForgeError.configuration(`Ollama URL must start with http:// or https://, got: ${normalized}`)
  }
  return normalized
}

export class OllamaProvider extends OpenAIProvider {
  override readonly name = 'ollama'
  readonly baseUrl: string

  constructor(options: OllamaProviderOptions) {
    const base = normalizeOllamaUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL)
    super({
      apiKey: 'ollama', // Ollama doesn't authenticate; the SDK requires a value
      model: options.model,
      baseUrl: `${base}/v1`,
      maxTokens: options.maxTokens,
    })
    this.baseUrl = base
  }
}
