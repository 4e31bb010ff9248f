/**
 * Provider factory: creates LLM provider instances from configuration.
 */

import type { GenerationConfig, ProviderName } from '../config/index.js'
import { KBForgeError } from '../common/index.js'
import type { LLMProvider } from './provider.js'
import { AnthropicProvider } from './anthropic-provider.js'
import { OpenAIProvider } from './openai-provider.js'
import { OllamaProvider } from './ollama-provider.js'

/** Default model per provider, used when the config names none. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
  ollama: 'qwen3:30b-a3b',
}

/**
 * Create a provider instance from configuration.
 * Throws CONFIGURATION_ERROR if required fields are missing (apiKey for non-Ollama providers).
 */
export function createProvider(config: GenerationConfig): LLMProvider {
  const model = config.model ?? DEFAULT_MODELS[config.provider]
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) throw KBForgeError.configuration('Anthropic API key is required')
      return new AnthropicProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'openai': {
      if (!config.apiKey) throw KBForgeError.configuration('OpenAI API key is required')
      return new OpenAIProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'ollama': {
      return new OllamaProvider({ model, baseUrl: config.ollamaBaseUrl, maxTokens: config.maxTokens })
    }
    default: {
      const _exhaustive: never = config.provider
      throw KBForgeError.configuration(`Unknown provider: ${String(_exhaustive)}`)
    }
  }
}
