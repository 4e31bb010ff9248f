/**
 * Vector search utilities: cosine similarity, stable top-K ranking, Float32 helpers.
 */

/** Pack a number array into a little-endian Float32 Buffer. */
export function packFloat32(vec: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(vec.length * 4)
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4)
  }
  return buf
}

/** Unpack a little-endian Float32 Buffer into a Float32Array. Returns null on corrupt data. */
export function unpackFloat32(blob: Buffer, dims: number): Float32Array | null {
  if (blob.byteLength !== dims * 4) {
    console.warn(`[vector-search] corrupt embedding blob: expected ${dims * 4} bytes, got ${blob.byteLength}`)
    return null
  }
  const arr = new Float32Array(dims)
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4)
  }
  return arr
}

/**
 * Cosine similarity. Vectors from EmbeddingClient are already normalized, but
 * the norms are computed anyway so foreign vectors compare correctly.
 * Mismatched dimensions or a zero vector score 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length || a.length === 0) return 0
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export interface RankCandidate<T> {
  item: T
  vector: ArrayLike<number>
  /** Insertion order; lower wins ties. */
  seq: number
}

/** Top-K by cosine similarity, highest first. Equal scores keep insertion order. */
export function rankBySimilarity<T>(
  query: ArrayLike<number>,
  candidates: RankCandidate<T>[],
  topK: number,
): Array<{ item: T; score: number }> {
  if (topK <= 0) return []
  return candidates
    .map(c => ({ item: c.item, seq: c.seq, score: cosineSimilarity(query, c.vector) }))
    .sort((a, b) => (b.score - a.score) || (a.seq - b.seq))
    .slice(0, topK)
    .map(({ item, score }) => ({ item, score }))
}
