import OpenAI from 'openai';
import type { EmbeddingProvider, EmbeddingVector } from '../ports/Embedder';
import { EmbeddingError } from '../core/errors';

export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';

/** The part of the OpenAI client the embedder calls. */
export interface EmbeddingsClient {
    embeddings: {
        create(body: { model: string; input: string[] }): Promise<{ data: { index: number; embedding: number[] }[] }>;
    };
}

export interface OpenAiEmbedderOptions {
    apiKey?: string;
    baseURL?: string;
    model?: string;
    client?: EmbeddingsClient;
}

export class OpenAiEmbedder implements EmbeddingProvider {
    readonly name: string;
    private readonly client: EmbeddingsClient;
    private readonly model: string;

    constructor(options: OpenAiEmbedderOptions = {}) {
        this.model = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
        this.name = `openai:${this.model}`;

        if (options.client) {
            this.client = options.client;
            return;
        }
        if (!options.apiKey) {
            throw new Error('OPENAI_API_KEY is not set');
        }
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseURL,
        });
    }

    async embed(text: string): Promise<EmbeddingVector> {
        const [embedding] = await this.embedBatch([text]);
        return embedding;
    }

    async embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
        if (texts.length === 0) return [];
        if (texts.some((text) => text.trim().length === 0)) {
            throw new EmbeddingError('Cannot embed empty text');
        }

        try {
            const response = await this.client.embeddings.create({
                model: this.model,
                input: [...texts]
            });

            // The API tags each embedding with its input position
            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            if (ordered.length !== texts.length) {
                throw new Error(`expected ${texts.length} embeddings, received ${ordered.length}`);
            }
            return ordered.map((item) => item.embedding);
        } catch (error) {
            throw new EmbeddingError(`Failed to generate embeddings: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error });
        }
    }

    async close(): Promise<void> {}
}
