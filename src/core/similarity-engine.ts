import { z } from 'zod';
import type { EmbeddingProvider } from '../ports/Embedder';
import type { QuestionRecord } from '../ports/CorpusSource';
import { type Logger, silentLogger } from '../logger';
import {
  DegenerateVectorError,
  EmbeddingError,
  EmptyCorpusError,
  InvalidQueryError,
  NotInitializedError,
} from './errors';
import { l2Normalize, VectorIndex } from './vector-index';

export interface SimilarityMatch {
  questionId: number;
  text: string;
  domain: string;
  subdomain: string;
  score: number;
}

export interface SimilarityQuery {
  /** Minimum score a match needs, inclusive. */
  threshold: number;
  /** Ceiling on candidates pulled from the index before the threshold filter. */
  topK: number;
}

export const DEFAULT_SIMILARITY_QUERY: SimilarityQuery = {
  threshold: 0.8,
  topK: 10,
};

const similarityQuerySchema = z.object({
  threshold: z.number().min(0).max(1),
  topK: z.number().int().positive(),
});

export function resolveSimilarityQuery(config: Partial<SimilarityQuery> = {}): SimilarityQuery {
  const parsed = similarityQuerySchema.safeParse({ ...DEFAULT_SIMILARITY_QUERY, ...config });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidQueryError(`Invalid similarity query: ${details.join('; ')}`);
  }
  return parsed.data;
}

type EngineState =
  | { status: 'uninitialized' }
  | { status: 'ready'; records: readonly QuestionRecord[]; index: VectorIndex | null };

export type EngineStatus = EngineState['status'];

export interface SimilarityEngineOptions {
  logger?: Logger;
}

/**
 * Finds corpus questions that are semantically close to a query.
 *
 * Lifecycle: `initialize()` embeds the corpus and builds the index, moving the
 * engine to `ready`; `dispose()` returns it to `uninitialized`. Calling
 * `initialize()` again rebuilds from scratch and swaps the new index in only
 * once it is complete. Queries never mutate engine state.
 */
export class SimilarityEngine {
  private state: EngineState = { status: 'uninitialized' };
  private generation = 0;
  private readonly logger: Logger;

  constructor(private readonly embedder: EmbeddingProvider, options: SimilarityEngineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  static async create(
    records: readonly QuestionRecord[],
    embedder: EmbeddingProvider,
    options: SimilarityEngineOptions = {},
  ): Promise<SimilarityEngine> {
    const engine = new SimilarityEngine(embedder, options);
    await engine.initialize(records);
    return engine;
  }

  get status(): EngineStatus {
    return this.state.status;
  }

  /** Number of indexed questions; records skipped during the build are not counted. */
  get size(): number {
    return this.state.status === 'ready' ? this.state.records.length : 0;
  }

  get dimension(): number | null {
    return this.state.status === 'ready' ? this.state.index?.dimension ?? null : null;
  }

  async initialize(corpus: readonly QuestionRecord[]): Promise<void> {
    const generation = ++this.generation;
    // Row order is id order, so score ties resolve to the lower question id.
    const records = [...corpus].sort((a, b) => a.id - b.id);

    if (records.length === 0) {
      this.logger.warn('No questions to index; similarity checks will return no matches');
      this.install(generation, [], null);
      return;
    }

    this.logger.info(`Generating embeddings for ${records.length} questions with ${this.embedder.name}...`);
    const vectors = await this.embedder.embedBatch(records.map((record) => record.text));
    if (vectors.length !== records.length) {
      throw new EmbeddingError(`${this.embedder.name} returned ${vectors.length} embeddings for ${records.length} questions`);
    }

    const kept: QuestionRecord[] = [];
    const keptVectors: Float32Array[] = [];
    records.forEach((record, i) => {
      try {
        keptVectors.push(l2Normalize(vectors[i], i));
        kept.push(record);
      } catch (error) {
        if (!(error instanceof DegenerateVectorError)) throw error;
        this.logger.warn(`Skipping question ${record.id}: ${error.message}`);
      }
    });

    let index: VectorIndex | null = null;
    try {
      index = VectorIndex.build(keptVectors);
    } catch (error) {
      if (!(error instanceof EmptyCorpusError)) throw error;
      this.logger.warn('Every question was skipped; similarity checks will return no matches');
    }

    if (this.install(generation, kept, index) && index) {
      this.logger.info(`Vector index built with ${index.size} vectors of dimension ${index.dimension}`);
    }
  }

  async findSimilar(queryText: string, config: Partial<SimilarityQuery> = {}): Promise<SimilarityMatch[]> {
    const state = this.state;
    if (state.status !== 'ready') {
      throw new NotInitializedError();
    }

    const query = resolveSimilarityQuery(config);
    if (queryText.trim().length === 0) {
      return [];
    }
    if (!state.index) {
      this.logger.debug('Index is empty, returning no matches');
      return [];
    }

    const queryVector = await this.embedder.embed(queryText);
    const hits = state.index.search(queryVector, query.topK);

    const matches: SimilarityMatch[] = [];
    for (const hit of hits) {
      if (hit.score < query.threshold) continue;
      const record = state.records[hit.row];
      matches.push({
        questionId: record.id,
        text: record.text,
        domain: record.domain,
        subdomain: record.subdomain,
        score: hit.score,
      });
    }

    this.logger.debug(`Found ${matches.length} of ${hits.length} candidates at or above threshold ${query.threshold}`);
    return matches;
  }

  dispose(): void {
    this.generation++;
    this.state = { status: 'uninitialized' };
  }

  private install(generation: number, records: QuestionRecord[], index: VectorIndex | null): boolean {
    if (generation !== this.generation) {
      this.logger.debug('Discarding index from a superseded initialization');
      return false;
    }
    this.state = { status: 'ready', records: Object.freeze(records), index };
    return true;
  }
}
