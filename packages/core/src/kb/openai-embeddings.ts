/**
 * OpenAI embedding client: calls OpenAI embeddings API with L2 normalization.
 */

import OpenAI from 'openai'
import type { EmbeddingClient, EmbedResult } from './embedding-client.js'
import { l2Normalize } from './embedding-client.js'

const MAX_BATCH_SIZE = 2048

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly providerFingerprint: string
  private readonly client: OpenAI

  constructor(options: {
    apiKey: string
    model?: string
    dimensions?: number
  }) {
    this.modelName = options.model ?? 'text-embedding-3-small'
    this.dimensions = options.dimensions ?? 1536
    this.providerFingerprint = `openai:${this.modelName}:openai`
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 })
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    // Process in batches respecting API limit
    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE)
      const response = await this.client.embeddings.create(
        {
          model: this.modelName,
          input: batch,
          ...(this.modelName.startsWith('text-embedding-3') ? { dimensions: this.dimensions } : {}),
        },
        { signal },
      )

      // Sort by index to preserve order (API may return unordered)
      const sorted = [...response.data].sort((a, b) => a.index - b.index)
      for (const item of sorted) {
        allEmbeddings.push(l2Normalize(item.embedding))
      }
    }

    return { embeddings: allEmbeddings }
  }
}
