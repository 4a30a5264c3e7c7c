import type { AppConfig } from './config';
import type { Logger } from './logger';
import type { CorpusSource } from './ports/CorpusSource';
import type { EmbeddingProvider } from './ports/Embedder';
import type { LLM } from './ports/LLM';
import { HashingEmbedder } from './adapters/HashingEmbedder';
import { JsonFileCorpusSource } from './adapters/JsonFileCorpusSource';
import { LocalEmbedder } from './adapters/LocalEmbedder';
import { OpenAiEmbedder } from './adapters/OpenAiEmbedder';
import { OpenAIChatAdapter } from './adapters/OpenAiLLM';
import { PostgresCorpusSource } from './adapters/PostgresCorpusSource';
import { SimilarityEngine } from './core/similarity-engine';

export function createEmbedder(config: AppConfig, logger: Logger): EmbeddingProvider {
  switch (config.embedder.kind) {
    case 'local':
      return new LocalEmbedder({ modelName: config.embedder.model, logger });
    case 'openai':
      return new OpenAiEmbedder({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
        model: config.embedder.model,
      });
    case 'hashing':
      return new HashingEmbedder();
  }
}

export function createCorpusSource(config: AppConfig, logger: Logger): CorpusSource {
  const corpus = config.corpus;
  if (corpus.source === 'postgres') {
    return new PostgresCorpusSource({ connectionString: corpus.databaseUrl, table: corpus.table, logger });
  }
  return new JsonFileCorpusSource(corpus.file, { logger });
}

export function createLLM(config: AppConfig): LLM {
  return new OpenAIChatAdapter({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    model: config.openai.chatModel,
  });
}

export interface SimilarityRuntime {
  engine: SimilarityEngine;
  close(): Promise<void>;
}

/** Loads the corpus once and builds a ready engine; `close()` releases the source and the embedder. */
export async function startSimilarity(
  corpusSource: CorpusSource,
  embedder: EmbeddingProvider,
  logger: Logger,
): Promise<SimilarityRuntime> {
  const engine = new SimilarityEngine(embedder, { logger });
  try {
    const records = await corpusSource.load();
    await engine.initialize(records);
  } catch (error) {
    await corpusSource.close();
    await embedder.close();
    throw error;
  }

  return {
    engine,
    close: async () => {
      engine.dispose();
      await corpusSource.close();
      await embedder.close();
    },
  };
}
