import { z } from 'zod';
import { EMBEDDING_CONFIG } from '@corpus-gate/shared';
import { EmbeddingFault, isAbortError } from './errors';
import { logger } from './logger';
import type { EmbeddingCache } from './redis';

/**
 * Embeddings Utility
 *
 * Talks to the embedding worker (sentence-transformers behind HTTP).
 *
 * CRITICAL: must use the same model as ingestion, or retrieval scores are
 * meaningless. The model name travels with every request and is checked
 * against the index manifest at startup.
 */

export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface HttpEmbedderOptions {
  serviceUrl: string;
  model: string;
  cache?: EmbeddingCache;
  cacheTtl?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

export class HttpEmbedder implements Embedder {
  readonly model: string;
  private readonly serviceUrl: string;
  private readonly cache?: EmbeddingCache;
  private readonly cacheTtl: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEmbedderOptions) {
    this.serviceUrl = options.serviceUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.cache = options.cache;
    this.cacheTtl = options.cacheTtl ?? EMBEDDING_CONFIG.CACHE_TTL;
    this.timeoutMs = options.timeoutMs ?? EMBEDDING_CONFIG.TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Generate an embedding, consulting the cache first when one is configured.
   * Cache failures are logged and bypassed; they never fail the query.
   */
  async embed(text: string): Promise<number[]> {
    if (this.cache) {
      try {
        const cached = await this.cache.get(this.model, text);
        if (cached) {
          return cached;
        }
      } catch (error) {
        logger.warn({ error }, 'Embedding cache read failed');
      }
    }

    const embedding = await this.callEmbeddingService(text);

    if (this.cache) {
      try {
        await this.cache.set(this.model, text, embedding, this.cacheTtl);
      } catch (error) {
        logger.warn({ error }, 'Embedding cache write failed');
      }
    }

    return embedding;
  }

  /**
   * Expected response: { embedding: number[] }
   */
  private async callEmbeddingService(text: string): Promise<number[]> {
    const url = `${this.serviceUrl}/embed`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text, model: this.model }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ error }, 'Embedding service call failed');
      if (isAbortError(error)) {
        throw new EmbeddingFault(`Embedding service timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new EmbeddingFault('Embedding service unreachable', { cause: error });
    }

    if (!response.ok) {
      throw new EmbeddingFault(`Embedding service returned ${response.status}`);
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingFault('Embedding service returned a malformed body');
    }
    return parsed.data.embedding;
  }
}
