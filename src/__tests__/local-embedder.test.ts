import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => {
  const model = vi.fn(async (texts: string[]) => ({
    dims: [texts.length, 3],
    data: Float32Array.from(texts.flatMap((text) => [text.length, 1, 0])),
  }));
  const pipeline = vi.fn(async (_task: string, _model: string) => model);
  return { model, pipeline };
});

vi.mock('@xenova/transformers', () => ({ pipeline: mocks.pipeline }));

import { LocalEmbedder, DEFAULT_LOCAL_MODEL } from '../adapters/LocalEmbedder';
import { EmbeddingError } from '../core/errors';

describe('LocalEmbedder', () => {
  beforeEach(() => {
    mocks.pipeline.mockClear();
    mocks.model.mockClear();
  });

  it('loads the model once for concurrent first calls', async () => {
    const embedder = new LocalEmbedder();
    await Promise.all([embedder.embed('a'), embedder.embed('bb'), embedder.embedBatch(['ccc'])]);

    expect(mocks.pipeline).toHaveBeenCalledOnce();
    expect(mocks.pipeline).toHaveBeenCalledWith('feature-extraction', DEFAULT_LOCAL_MODEL);
  });

  it('splits batch output into one vector per input, in order', async () => {
    const embedder = new LocalEmbedder({ modelName: 'test/model' });
    const vectors = await embedder.embedBatch(['a', 'abcd']);

    expect(vectors).toEqual([[1, 1, 0], [4, 1, 0]]);
    expect(mocks.model).toHaveBeenCalledWith(['a', 'abcd'], { pooling: 'mean', normalize: true });
    expect(embedder.name).toBe('local:test/model');
  });

  it('returns nothing for an empty batch without loading the model', async () => {
    await expect(new LocalEmbedder().embedBatch([])).resolves.toEqual([]);
    expect(mocks.pipeline).not.toHaveBeenCalled();
  });

  it('rejects empty text', async () => {
    await expect(new LocalEmbedder().embed('  ')).rejects.toThrow(EmbeddingError);
  });

  it('reports a failed load and retries on the next call', async () => {
    mocks.pipeline.mockRejectedValueOnce(new Error('model not found'));
    const embedder = new LocalEmbedder();

    await expect(embedder.embed('x')).rejects.toThrow(`Failed to load embedding model ${DEFAULT_LOCAL_MODEL}: model not found`);
    await expect(embedder.embed('x')).resolves.toEqual([1, 1, 0]);
    expect(mocks.pipeline).toHaveBeenCalledTimes(2);
  });

  it('wraps inference failures', async () => {
    mocks.model.mockRejectedValueOnce(new Error('bad tensor'));
    await expect(new LocalEmbedder().embed('x')).rejects.toThrow(new EmbeddingError('Failed to generate embeddings: bad tensor'));
  });
});
