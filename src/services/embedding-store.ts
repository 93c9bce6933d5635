/**
 * Embedding Store
 * Per-session cache of message embeddings plus cosine similarity lookups
 */

import { EmbeddingUnavailableError } from '../errors.js';
import type { EmbeddingBackend, Message, RequestOptions } from '../types/index.js';

/**
 * Message id -> vector, all vectors sharing one dimension.
 * The dimension is fixed by the first vector stored.
 */
export class EmbeddingIndex {
  private readonly vectors = new Map<string, number[]>();
  private dim: number | null;

  constructor(dimension: number | null = null) {
    this.dim = dimension;
  }

  static fromRecord(dimension: number | null, vectors: Record<string, number[]>): EmbeddingIndex {
    const index = new EmbeddingIndex(dimension);
    for (const [id, vector] of Object.entries(vectors)) {
      index.set(id, vector);
    }
    return index;
  }

  get dimension(): number | null {
    return this.dim;
  }

  get size(): number {
    return this.vectors.size;
  }

  get(id: string): number[] | undefined {
    return this.vectors.get(id);
  }

  has(id: string): boolean {
    return this.vectors.has(id);
  }

  set(id: string, vector: number[]): void {
    if (this.dim === null) {
      this.dim = vector.length;
    } else if (vector.length !== this.dim) {
      throw new RangeError(`Embedding dimension ${vector.length} does not match index dimension ${this.dim}`);
    }
    this.vectors.set(id, vector);
  }

  delete(id: string): void {
    this.vectors.delete(id);
  }

  toRecord(): { dimension: number | null; vectors: Record<string, number[]> } {
    return { dimension: this.dim, vectors: Object.fromEntries(this.vectors) };
  }
}

/**
 * Cosine similarity in [-1, 1]. Zero or mismatched vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;

  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.max(-1, Math.min(1, similarity));
}

export class EmbeddingStore {
  constructor(
    private readonly backend: EmbeddingBackend,
    readonly index: EmbeddingIndex = new EmbeddingIndex()
  ) {}

  /**
   * Embed arbitrary text. Any backend failure or malformed vector is
   * reported as EmbeddingUnavailableError.
   */
  async embed(text: string, options?: RequestOptions): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.backend.embedText(text, options);
    } catch (error) {
      throw new EmbeddingUnavailableError('Embedding backend failed', { cause: error });
    }

    if (!Array.isArray(vector) || vector.length === 0 || !vector.every(Number.isFinite)) {
      throw new EmbeddingUnavailableError('Embedding backend returned a malformed vector');
    }
    const dimension = this.index.dimension;
    if (dimension !== null && vector.length !== dimension) {
      throw new EmbeddingUnavailableError(
        `Embedding backend returned ${vector.length} dimensions, index holds ${dimension}`
      );
    }
    return vector;
  }

  /** Cached vector for a message, computing it on first use only. */
  async embedMessage(message: Message, options?: RequestOptions): Promise<number[]> {
    const cached = this.index.get(message.id);
    if (cached) return cached;

    const vector = await this.embed(message.content, options);
    this.index.set(message.id, vector);
    return vector;
  }

  lookup(message: Message): number[] | undefined {
    return this.index.get(message.id);
  }

  forget(messageId: string): void {
    this.index.delete(messageId);
  }

  similarity(a: readonly number[], b: readonly number[]): number {
    return cosineSimilarity(a, b);
  }
}
