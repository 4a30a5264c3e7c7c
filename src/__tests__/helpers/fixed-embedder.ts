import type { EmbeddingProvider, EmbeddingVector } from '../../ports/Embedder';
import { EmbeddingError } from '../../core/errors';

/** Embeds by table lookup; unknown text is an EmbeddingError. */
export class FixedEmbedder implements EmbeddingProvider {
  readonly name = 'fixed';
  embedCalls = 0;
  batchCalls = 0;

  constructor(private readonly vectors: Record<string, number[]>) {}

  async embed(text: string): Promise<EmbeddingVector> {
    this.embedCalls++;
    return this.lookup(text);
  }

  async embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    this.batchCalls++;
    return texts.map((text) => this.lookup(text));
  }

  async close(): Promise<void> {}

  private lookup(text: string): number[] {
    const vector = this.vectors[text];
    if (!vector) {
      throw new EmbeddingError(`No fixture vector for "${text}"`);
    }
    return vector;
  }
}

export function question(id: number, text: string, domain = 'Calculus', subdomain = 'Derivatives') {
  return { id, text, domain, subdomain };
}
