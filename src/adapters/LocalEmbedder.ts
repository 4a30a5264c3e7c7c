import { pipeline, type FeatureExtractionPipeline } from '@xenova/transformers';
import type { EmbeddingProvider, EmbeddingVector } from '../ports/Embedder';
import { EmbeddingError } from '../core/errors';
import { type Logger, silentLogger } from '../logger';

export const DEFAULT_LOCAL_MODEL = 'Xenova/all-MiniLM-L6-v2';

export interface LocalEmbedderOptions {
  modelName?: string;
  logger?: Logger;
}

export class LocalEmbedder implements EmbeddingProvider {
  readonly name: string;
  private model: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;
  private readonly modelName: string;
  private readonly logger: Logger;

  constructor(options: LocalEmbedderOptions = {}) {
    this.modelName = options.modelName ?? DEFAULT_LOCAL_MODEL;
    this.logger = options.logger ?? silentLogger;
    this.name = `local:${this.modelName}`;
  }

  // Concurrent first callers share one load; a failed load may be retried.
  private async initializeModel(): Promise<FeatureExtractionPipeline> {
    if (this.model) return this.model;

    if (!this.loading) {
      this.logger.info('🤖 Loading local embedding model...');
      this.loading = (async () => {
        try {
          const model = await pipeline('feature-extraction', this.modelName) as FeatureExtractionPipeline;
          this.model = model;
          this.logger.success('✅ Local embedding model loaded successfully');
          return model;
        } catch (error) {
          throw new EmbeddingError(`Failed to load embedding model ${this.modelName}: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error });
        } finally {
          this.loading = null;
        }
      })();
    }

    return this.loading;
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

    const model = await this.initializeModel();

    try {
      // Mean pooling, normalized; output dims are [batch, dimension]
      const result = await model([...texts], {
        pooling: 'mean',
        normalize: true
      });

      const dimension = result.dims[result.dims.length - 1];
      const data = Array.from(result.data as Float32Array);
      if (!dimension || data.length !== dimension * texts.length) {
        throw new Error(`Unexpected output shape [${result.dims.join(', ')}] for ${texts.length} inputs`);
      }

      return texts.map((_, i) => data.slice(i * dimension, (i + 1) * dimension));
    } catch (error) {
      throw new EmbeddingError(`Failed to generate embeddings: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    this.model = null;
  }
}
