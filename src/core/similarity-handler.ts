import { type Logger, silentLogger } from '../logger';
import { DegenerateVectorError, DimensionMismatchError, EmbeddingError } from './errors';
import {
  resolveSimilarityQuery,
  type SimilarityEngine,
  type SimilarityMatch,
  type SimilarityQuery,
} from './similarity-engine';

/** Wire shape of a match. */
export interface SerializedMatch {
  question_id: number;
  question: string;
  similarity_score: number;
  domain: string;
  subdomain: string;
  is_exact_match: boolean;
}

export type SimilarityOutcome =
  | {
    status: 'ok';
    similarQuestions: SerializedMatch[];
    threshold: number;
    exactMatchFound: boolean;
    exactMatchId: number | null;
  }
  | {
    status: 'failed';
    threshold: number;
    error: Error;
    message: string;
  };

export interface SimilarityCheckOptions extends Partial<SimilarityQuery> {
  /** Leave exact and near-exact matches out of `similarQuestions`. */
  excludeExact?: boolean;
}

export const EXACT_MATCH_SCORE = 0.99;

export function normalizeQuestionText(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function isExactMatch(query: string, match: SimilarityMatch): boolean {
  return normalizeQuestionText(query) === normalizeQuestionText(match.text) || match.score >= EXACT_MATCH_SCORE;
}

export function serializeMatch(match: SimilarityMatch, exact: boolean): SerializedMatch {
  return {
    question_id: match.questionId,
    question: match.text,
    similarity_score: Math.round(match.score * 10000) / 10000,
    domain: match.domain,
    subdomain: match.subdomain,
    is_exact_match: exact,
  };
}

function isComputationFailure(error: unknown): error is EmbeddingError | DimensionMismatchError | DegenerateVectorError {
  return error instanceof EmbeddingError || error instanceof DimensionMismatchError || error instanceof DegenerateVectorError;
}

/**
 * Duplicate check offered to the CLI. Failures to compute similarity come back
 * as a `failed` outcome so they are never mistaken for "no similar questions";
 * misuse of the engine (not initialized, bad query options) still throws.
 */
export class SimilarityHandler {
  constructor(private readonly engine: SimilarityEngine, private readonly logger: Logger = silentLogger) {}

  async run(question: string, options: SimilarityCheckOptions = {}): Promise<SimilarityOutcome> {
    const { excludeExact = true, ...queryOptions } = options;
    const query = resolveSimilarityQuery(queryOptions);

    // Excluded exact matches would otherwise use up topK slots.
    const candidates = excludeExact ? query.topK * 2 : query.topK;

    let matches: SimilarityMatch[];
    try {
      matches = await this.engine.findSimilar(question, { threshold: query.threshold, topK: candidates });
    } catch (error) {
      if (!isComputationFailure(error)) throw error;
      this.logger.error(`❌ Similarity check failed: ${error.message}`);
      return {
        status: 'failed',
        threshold: query.threshold,
        error,
        message: `Similarity check failed: ${error.message}`,
      };
    }

    let exactMatchId: number | null = null;
    const similarQuestions: SerializedMatch[] = [];

    for (const match of matches) {
      if (similarQuestions.length === query.topK) break;
      const exact = isExactMatch(question, match);
      if (exact) {
        exactMatchId ??= match.questionId;
        this.logger.debug(`Found exact match: question ID ${match.questionId}`);
        if (excludeExact) continue;
      }
      similarQuestions.push(serializeMatch(match, exact));
    }

    this.logger.info(`Found ${similarQuestions.length} similar questions above threshold ${query.threshold} (exact match found: ${exactMatchId !== null}, excluded: ${excludeExact})`);

    return {
      status: 'ok',
      similarQuestions,
      threshold: query.threshold,
      exactMatchFound: exactMatchId !== null,
      exactMatchId,
    };
  }
}
