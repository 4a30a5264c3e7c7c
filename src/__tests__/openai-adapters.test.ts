import { describe, it, expect, vi } from 'vitest';
import { OpenAiEmbedder, type EmbeddingsClient } from '../adapters/OpenAiEmbedder';
import { OpenAIChatAdapter, type ChatClient } from '../adapters/OpenAiLLM';
import { EmbeddingError } from '../core/errors';

describe('OpenAiEmbedder', () => {
  it('restores input order from the response indices', async () => {
    const create = vi.fn(async () => ({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    }));
    const client: EmbeddingsClient = { embeddings: { create } };
    const embedder = new OpenAiEmbedder({ client });

    await expect(embedder.embedBatch(['first', 'second'])).resolves.toEqual([[1, 0], [0, 1]]);
    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['first', 'second'] });
    expect(embedder.name).toBe('openai:text-embedding-3-small');
  });

  it('wraps API failures in EmbeddingError', async () => {
    const client: EmbeddingsClient = { embeddings: { create: vi.fn(async () => { throw new Error('401 Unauthorized'); }) } };
    await expect(new OpenAiEmbedder({ client }).embed('q')).rejects.toThrow(new EmbeddingError('Failed to generate embeddings: 401 Unauthorized'));
  });

  it('requires an API key without an injected client', () => {
    expect(() => new OpenAiEmbedder()).toThrow('OPENAI_API_KEY is not set');
  });
});

describe('OpenAIChatAdapter', () => {
  it('sends the messages and returns the first choice', async () => {
    const create = vi.fn(async () => ({ choices: [{ message: { content: '{"ok": true}' } }] }));
    const client: ChatClient = { chat: { completions: { create } } };
    const llm = new OpenAIChatAdapter({ client, model: 'test-model' });

    const reply = await llm.generateCompletion([{ role: 'user', content: 'hi' }], { temperature: 0, json: true });

    expect(reply).toBe('{"ok": true}');
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0,
      max_tokens: 1000,
      response_format: { type: 'json_object' },
    });
  });

  it('returns an empty string when the model sends no content', async () => {
    const client: ChatClient = { chat: { completions: { create: vi.fn(async () => ({ choices: [] })) } } };
    await expect(new OpenAIChatAdapter({ client }).generateCompletion([{ role: 'user', content: 'hi' }])).resolves.toBe('');
  });
});
