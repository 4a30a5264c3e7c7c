import {
  DegenerateVectorError,
  DimensionMismatchError,
  EmptyCorpusError,
  InvalidQueryError,
} from './errors';

export interface IndexHit {
  row: number;
  score: number;
}

/**
 * Scales a vector to unit L2 norm. Throws DegenerateVectorError when the norm
 * is zero or not finite, since the direction is then undefined.
 */
export function l2Normalize(vector: ArrayLike<number>, row: number | null = null): Float32Array {
  let sumSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumSquares += vector[i] * vector[i];
  }

  const norm = Math.sqrt(sumSquares);
  if (norm === 0 || !Number.isFinite(norm)) {
    throw new DegenerateVectorError(row);
  }

  const normalized = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i++) {
    normalized[i] = vector[i] / norm;
  }
  return normalized;
}

/**
 * Exact nearest-neighbour index over unit-normalized vectors.
 *
 * Rows live in one contiguous row-major matrix, so a query is a single dense
 * matrix-vector product. Inner product on unit vectors is cosine similarity.
 * The index is immutable; rebuilding means building a new one.
 */
export class VectorIndex {
  private constructor(
    private readonly matrix: Float32Array,
    readonly size: number,
    readonly dimension: number,
  ) {}

  static build(vectors: readonly ArrayLike<number>[]): VectorIndex {
    if (vectors.length === 0) {
      throw new EmptyCorpusError();
    }

    const dimension = vectors[0].length;
    if (dimension === 0) {
      throw new DegenerateVectorError(0);
    }

    const matrix = new Float32Array(vectors.length * dimension);
    vectors.forEach((vector, row) => {
      if (vector.length !== dimension) {
        throw new DimensionMismatchError(dimension, vector.length);
      }
      matrix.set(l2Normalize(vector, row), row * dimension);
    });

    return new VectorIndex(matrix, vectors.length, dimension);
  }

  row(index: number): Float32Array {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Row ${index} is out of range [0, ${this.size})`);
    }
    return this.matrix.slice(index * this.dimension, (index + 1) * this.dimension);
  }

  /** Top `k` rows by score, descending; equal scores keep the lower row first. */
  search(query: ArrayLike<number>, k: number): IndexHit[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidQueryError(`k must be a positive integer, got ${k}`);
    }
    if (query.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, query.length);
    }

    const q = l2Normalize(query);
    const hits: IndexHit[] = new Array(this.size);

    for (let row = 0; row < this.size; row++) {
      const offset = row * this.dimension;
      let score = 0;
      for (let i = 0; i < this.dimension; i++) {
        score += q[i] * this.matrix[offset + i];
      }
      hits[row] = { row, score };
    }

    hits.sort((a, b) => b.score - a.score || a.row - b.row);
    return hits.slice(0, Math.min(k, this.size));
  }
}
