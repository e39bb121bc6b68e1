/**
 * Shared constants for Corpus Gate.
 */

export const LATENCY_BUDGETS = {
  RETRIEVAL: 500, // ms, embedding + search
  GENERATION: 60000, // ms
  TOTAL: 90000, // ms
} as const;

export const RAG_DEFAULTS = {
  TOP_K: 8,
  MIN_SCORE: 0.25,
  MAX_CONTEXT_CHARS: 3000,
} as const;

export const CHUNKING_CONFIG = {
  CHUNK_SIZE: 800, // characters
  CHUNK_OVERLAP: 150, // characters
} as const;

export const EMBEDDING_CONFIG = {
  MODEL: 'sentence-transformers/all-MiniLM-L6-v2',
  CACHE_TTL: 86400, // 24 hours
  TIMEOUT_MS: 30000,
} as const;

export const GENERATION_CONFIG = {
  URL: 'http://localhost:11434/api/generate',
  MODEL: 'llama3.1',
  TIMEOUT_MS: 120000,
} as const;

export const INDEX_FILES = {
  VECTORS: 'vectors.json',
  CHUNKS: 'chunks.json',
} as const;

/**
 * The single refusal message. Every gate returns it verbatim, and the
 * generator is instructed to reply with exactly this text when it declines.
 */
export const REFUSAL_TEXT =
  'I cannot answer this question within the constraints of this agent. ' +
  'The answer would require concepts or frameworks not contained in the provided corpus.';
