import { vi, type Mock } from 'vitest';
import type { Passage, RagSettings } from '@corpus-gate/shared';
import type { SearchHit, VectorIndex } from '../src/services/vectorIndex';
import type { Embedder } from '../src/utils/embeddings';
import type { LLMClient } from '../src/utils/llm';
import type { EmbeddingCache } from '../src/utils/redis';

export const SETTINGS: RagSettings = { topK: 8, minScore: 0.25, maxContextChars: 3000 };

export const PASSAGES: readonly Passage[] = [
  {
    text: 'Sartre describes abandonment as the discovery that we are left alone to choose.',
    sourceDocument: 'existentialism-humanism.txt',
    pageNumber: 3,
    embedding: [1, 0, 0],
  },
  {
    text: 'Faith and freedom are intertwined for the one who deceives himself.',
    sourceDocument: 'being-and-nothingness.txt',
    pageNumber: 48,
    embedding: [0, 1, 0],
  },
  {
    text: 'Anguish accompanies every genuine choice.',
    sourceDocument: 'existentialism-humanism.txt',
    pageNumber: 5,
    embedding: [0, 0, 1],
  },
];

export const WELL_FORMED_ANSWER = [
  '[SECTION 1] Explanation',
  'Abandonment means no outside authority chooses for us: "we are left alone to choose" [existentialism-humanism.txt p.3].',
  '',
  '[SECTION 2] Question:',
  'If nobody chooses for you, who answers for your choice?',
].join('\n');

/**
 * Index stand-in returning fixed hits, whatever the query vector.
 */
export function stubIndex(
  hits: SearchHit[],
  dimension = 3
): VectorIndex & { search: Mock<VectorIndex['search']> } {
  return {
    dimension,
    size: hits.length,
    search: vi.fn<VectorIndex['search']>((_query, k) => hits.slice(0, k)),
  };
}

export function fakeEmbedder(
  vectors: Record<string, number[]> = {},
  fallback: number[] = [1, 0, 0]
): Embedder & { embed: Mock<Embedder['embed']> } {
  return {
    model: 'test-embedding-model',
    embed: vi.fn<Embedder['embed']>(async (text) => vectors[text] ?? fallback),
  };
}

export function stubLLM(
  response: string = WELL_FORMED_ANSWER
): LLMClient & { generate: Mock<LLMClient['generate']> } {
  return {
    model: 'test-llm',
    generate: vi.fn<LLMClient['generate']>().mockResolvedValue(response),
  };
}

export class MemoryEmbeddingCache implements EmbeddingCache {
  readonly entries = new Map<string, { embedding: number[]; ttl: number }>();
  healthy = true;

  async get(model: string, text: string): Promise<number[] | null> {
    return this.entries.get(`${model}|${text}`)?.embedding ?? null;
  }

  async set(model: string, text: string, embedding: number[], ttl: number): Promise<void> {
    this.entries.set(`${model}|${text}`, { embedding, ttl });
  }

  async ping(): Promise<boolean> {
    return this.healthy;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
