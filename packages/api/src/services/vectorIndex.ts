import { dotProduct } from '@corpus-gate/shared';

/**
 * Vector Index
 *
 * Exhaustive inner-product search over L2-normalised rows, so every score is a
 * cosine similarity. Built once from the ingestion artifacts and never mutated.
 */

export interface SearchHit {
  /** Position in the index; pairs with the passage at the same position. */
  id: number;
  score: number;
}

export interface VectorIndex {
  readonly dimension: number;
  readonly size: number;
  search(query: readonly number[], k: number): SearchHit[];
}

export class FlatInnerProductIndex implements VectorIndex {
  readonly dimension: number;
  private readonly vectors: ReadonlyArray<readonly number[]>;

  constructor(dimension: number, vectors: ReadonlyArray<readonly number[]>) {
    for (const [position, vector] of vectors.entries()) {
      if (vector.length !== dimension) {
        throw new Error(
          `Vector ${position} has dimension ${vector.length}, expected ${dimension}`
        );
      }
    }
    this.dimension = dimension;
    this.vectors = vectors;
  }

  get size(): number {
    return this.vectors.length;
  }

  /**
   * Top-k by descending score; equal scores keep index order.
   */
  search(query: readonly number[], k: number): SearchHit[] {
    if (query.length !== this.dimension) {
      throw new Error(
        `Query has dimension ${query.length}, index expects ${this.dimension}`
      );
    }
    if (k <= 0 || this.vectors.length === 0) {
      return [];
    }

    const hits = this.vectors.map((vector, id) => ({ id, score: dotProduct(query, vector) }));
    hits.sort((a, b) => b.score - a.score || a.id - b.id);
    return hits.slice(0, k);
  }
}
