import { describe, it, expect } from 'vitest';
import { fnv1a, HashingEmbedder, tokenize } from '../adapters/HashingEmbedder';
import { EmbeddingError } from '../core/errors';

function cosine(a: readonly number[], b: readonly number[]): number {
  return a.reduce((sum, value, i) => sum + value * b[i], 0);
}

describe('tokenize', () => {
  it('lowercases and splits on anything that is not a letter or digit', () => {
    expect(tokenize("Prove Pythagoras' theorem")).toEqual(['prove', 'pythagoras', 'theorem']);
    expect(tokenize('What is the derivative of x^2?')).toEqual(['what', 'is', 'the', 'derivative', 'of', 'x', '2']);
  });
});

describe('fnv1a', () => {
  it('matches the reference 32-bit FNV-1a values', () => {
    expect(fnv1a('')).toBe(2166136261);
    expect(fnv1a('a')).toBe(0xe40c292c);
  });
});

describe('HashingEmbedder', () => {
  it('produces unit vectors of the configured dimension', async () => {
    const vector = await new HashingEmbedder(64).embed('integrate x squared');
    expect(vector).toHaveLength(64);
    expect(Math.sqrt(cosine(vector, vector))).toBeCloseTo(1, 10);
  });

  it('is deterministic', async () => {
    const embedder = new HashingEmbedder();
    expect(await embedder.embed('limits of sequences')).toEqual(await embedder.embed('limits of sequences'));
  });

  it('embeds a batch in input order', async () => {
    const embedder = new HashingEmbedder();
    const batch = await embedder.embedBatch(['alpha', 'beta']);
    expect(batch).toEqual([await embedder.embed('alpha'), await embedder.embed('beta')]);
  });

  it('scores related questions above unrelated ones', async () => {
    const embedder = new HashingEmbedder();
    const [a, b, c] = await embedder.embedBatch([
      'What is the derivative of x^2?',
      'What is the derivative of x squared?',
      'What is your favorite color?',
    ]);
    expect(cosine(a, b)).toBeGreaterThan(cosine(a, c));
  });

  it('rejects empty text', async () => {
    await expect(new HashingEmbedder().embed('   ')).rejects.toThrow(EmbeddingError);
  });

  it('embeds text without letters or digits as the zero vector', async () => {
    const vector = await new HashingEmbedder(8).embed('∑ + ∫ = ?');
    expect(vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('rejects an invalid dimension', () => {
    expect(() => new HashingEmbedder(0)).toThrow(RangeError);
  });
});
