import type { EmbeddingProvider, EmbeddingVector } from '../ports/Embedder';
import { EmbeddingError } from '../core/errors';

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

export const DEFAULT_HASHING_DIMENSION = 384;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/** 32-bit FNV-1a over UTF-16 code units. */
export function fnv1a(token: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Offline bag-of-words embedder: each token increments the bucket its hash
 * falls in, and the counts are scaled to unit length. Text without letters or
 * digits embeds to the zero vector. Lexical rather than semantic, but
 * deterministic and free of model downloads.
 */
export class HashingEmbedder implements EmbeddingProvider {
  readonly name: string;

  constructor(readonly dimension: number = DEFAULT_HASHING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`dimension must be a positive integer, got ${dimension}`);
    }
    this.name = `hashing:${dimension}`;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.embedSync(text);
  }

  async embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.embedSync(text));
  }

  async close(): Promise<void> {}

  private embedSync(text: string): number[] {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Cannot embed empty text');
    }

    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = tokenize(text);
    // Symbol-only text has no direction; callers see a DegenerateVectorError when normalizing.
    if (tokens.length === 0) {
      return vector;
    }

    for (const token of tokens) {
      vector[fnv1a(token) % this.dimension] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return vector.map((value) => value / norm);
  }
}
