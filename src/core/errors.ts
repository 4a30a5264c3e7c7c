export class SimilarityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The embedding provider could not produce a vector for the given input. */
export class EmbeddingError extends SimilarityError {}

export class DegenerateVectorError extends SimilarityError {
  constructor(readonly row: number | null) {
    super(row === null
      ? 'Cannot normalize a zero-length or non-finite vector'
      : `Cannot normalize vector at row ${row}: zero-length or non-finite`);
  }
}

export class EmptyCorpusError extends SimilarityError {
  constructor() {
    super('Cannot build a vector index from zero vectors');
  }
}

/** Corpus and query embeddings disagree on dimension. Always a configuration problem. */
export class DimensionMismatchError extends SimilarityError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
  }
}

export class NotInitializedError extends SimilarityError {
  constructor() {
    super('Similarity engine is not initialized; call initialize() first');
  }
}

export class InvalidQueryError extends SimilarityError {}
