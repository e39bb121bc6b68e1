/**
 * Core types for Corpus Gate.
 * Shared by the API service, the ingestion CLI and the tests.
 */

/**
 * A bounded excerpt of source text with provenance and a precomputed,
 * L2-normalised embedding. Identity is its position in the index.
 */
export interface Passage {
  readonly text: string;
  readonly sourceDocument: string;
  readonly pageNumber: number;
  readonly embedding: readonly number[];
}

export interface ScoredPassage {
  passage: Passage;
  score: number;
}

export interface RetrievalResult {
  passages: ScoredPassage[];
  /** Score of the single closest neighbour, before the per-passage floor. */
  bestScore: number;
}

export interface Context {
  text: string;
  passages: ScoredPassage[];
}

export type RefusalGate =
  | 'topic-gate'
  | 'score-threshold'
  | 'support-verifier'
  | 'generator-self-refusal';

export interface RefusalDecision {
  refused: true;
  gate: RefusalGate;
}

export interface RagSettings {
  topK: number;
  minScore: number;
  maxContextChars: number;
}

export interface SourceReference {
  sourceDocument: string;
  pageNumber: number;
  score: number;
}

export interface AnswerStructure {
  hasExplanation: boolean;
  hasQuestion: boolean;
  questionEndsWithMark: boolean;
}

export type QueryResponse =
  | {
      requestId: string;
      query: string;
      status: 'refused';
      answer: string;
    }
  | {
      requestId: string;
      query: string;
      status: 'answered';
      answer: string;
      sources: SourceReference[];
      context?: string;
      structure?: AnswerStructure;
      metadata: {
        bestScore: number;
        minScore: number;
        passagesRetrieved: number;
        passagesInContext: number;
        latency: {
          total: number;
          retrieval: number;
          generation: number;
        };
        latencyBudgetViolations: string[];
      };
    };

/**
 * On-disk shape of one passage record written by ingestion.
 */
export interface ChunkRecord {
  chunk: string;
  page: number;
  source: string;
}

/**
 * On-disk shape of the vector index written by ingestion.
 */
export interface VectorIndexFile {
  model: string;
  dimension: number;
  vectors: number[][];
}
