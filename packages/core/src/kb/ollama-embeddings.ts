/**
 * Ollama embedding client: calls /api/embed for local vector embeddings.
 * L2-normalizes each vector before returning.
 */

import { z } from 'zod'
import type { EmbeddingClient, EmbedResult } from './embedding-client.js'
import { l2Normalize } from './embedding-client.js'
import { normalizeOllamaUrl, DEFAULT_OLLAMA_URL } from '../agents/ollama-provider.js'

const MAX_BATCH_SIZE = 50
const MAX_BATCH_CHARS = 100_000

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
})

export class OllamaEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly providerFingerprint: string
  private _dimensions: number
  private readonly baseUrl: string

  get dimensions(): number {
    return this._dimensions
  }

  constructor(options: {
    model: string
    baseUrl?: string
    dimensions?: number
  }) {
    this.modelName = options.model
    this.baseUrl = normalizeOllamaUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL)
    this._dimensions = options.dimensions ?? 768
    this.providerFingerprint = `ollama:${options.model}:unknown`
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    // Process in batches respecting size limits
    let batchStart = 0
    while (batchStart < texts.length) {
      let batchEnd = batchStart
      let batchChars = 0

      while (batchEnd < texts.length && batchEnd - batchStart < MAX_BATCH_SIZE) {
        const textChars = texts[batchEnd].length
        if (batchChars + textChars > MAX_BATCH_CHARS && batchEnd > batchStart) break
        batchChars += textChars
        batchEnd++
      }

      const batchResult = await this.embedBatch(texts.slice(batchStart, batchEnd), signal)
      allEmbeddings.push(...batchResult)

      batchStart = batchEnd
    }

    return { embeddings: allEmbeddings }
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.modelName, input: texts }),
      signal,
    })

    if (!response.ok) {
      const body = await response.text().catch(() => '')
      throw new Error(`Ollama embed failed (${response.status}): ${body.slice(0, 200)}`)
    }

    const parsed = EmbedResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new Error('Ollama embed response missing embeddings array')
    }

    const { embeddings } = parsed.data
    // Update dimensions from actual response
    if (embeddings.length > 0 && embeddings[0].length !== this._dimensions) {
      this._dimensions = embeddings[0].length
    }

    return embeddings.map(l2Normalize)
  }
}
