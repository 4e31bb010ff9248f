/**
 * Creates the embedding client named by configuration.
 */

import { KBForgeError } from '../common/index.js'
import type { EmbeddingConfig } from '../config/index.js'
import type { EmbeddingClient } from './embedding-client.js'
import { OpenAIEmbeddingClient } from './openai-embeddings.js'
import { OllamaEmbeddingClient } from './ollama-embeddings.js'

export const DEFAULT_EMBEDDING_MODELS = {
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text',
} as const

export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  switch (config.provider) {
    case 'openai': {
      if (!config.apiKey) throw KBForgeError.configuration('OpenAI API key is required for embeddings')
      return new OpenAIEmbeddingClient({
        apiKey: config.apiKey,
        model: config.model ?? DEFAULT_EMBEDDING_MODELS.openai,
        dimensions: config.dimensions,
      })
    }
    case 'ollama':
      return new OllamaEmbeddingClient({
        model: config.model ?? DEFAULT_EMBEDDING_MODELS.ollama,
        baseUrl: config.ollamaBaseUrl,
        dimensions: config.dimensions,
      })
    default: {
      const _exhaustive: never = config.provider
      throw KBForgeError.configuration(`Unknown embedding provider: ${String(_exhaustive)}`)
    }
  }
}
