/**
 * Embedding client interface: framework-agnostic contract for vector embedding providers.
 * Implementations reject on transport failure; EmbeddingIndex owns timeout and retry.
 */

export interface EmbeddingClient {
  /** Embed one or more texts into vectors. Each vector is L2-normalized. */
  embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult>
  readonly modelName: string
  readonly dimensions: number
  /** Detects silent model changes. Format: "${provider}:${model}:${version}" */
  readonly providerFingerprint: string
}

export interface EmbedResult {
  /** Each vector already L2-normalized by the client. */
  embeddings: number[][]
}

export function l2Normalize(vec: number[]): number[] {
  let norm = 0
  for (let i = 0; i < vec.length; i++) {
    norm += vec[i] * vec[i]
  }
  norm = Math.sqrt(norm)
  if (norm === 0) return vec
  return vec.map(v => v / norm)
}
