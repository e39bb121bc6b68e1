import { createHash } from 'node:crypto';
import Redis from 'ioredis';
import { logger } from './logger';

/**
 * Query embedding cache.
 *
 * The index is read-only while serving, so the only thing worth caching is the
 * embedding of a repeated query. Keys include the model name so a model change
 * never serves stale vectors.
 */
export interface EmbeddingCache {
  get(model: string, text: string): Promise<number[] | null>;
  set(model: string, text: string, embedding: number[], ttl: number): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function embeddingCacheKey(model: string, text: string): string {
  const digest = createHash('sha256').update(text).digest('hex');
  return `embed:${model}:${digest}`;
}

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(private readonly redis: Redis) {}

  async get(model: string, text: string): Promise<number[] | null> {
    const cached = await this.redis.get(embeddingCacheKey(model, text));
    if (!cached) return null;

    const parsed: unknown = JSON.parse(cached);
    if (!Array.isArray(parsed) || !parsed.every((value) => typeof value === 'number')) {
      logger.warn({ model }, 'Discarding malformed cached embedding');
      return null;
    }
    return parsed;
  }

  async set(model: string, text: string, embedding: number[], ttl: number): Promise<void> {
    await this.redis.setex(embeddingCacheKey(model, text), ttl, JSON.stringify(embedding));
  }

  /**
   * Health check: verify Redis connectivity.
   */
  async ping(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch (error) {
      logger.warn({ error }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

export function createRedisEmbeddingCache(url: string): RedisEmbeddingCache {
  logger.info('Initializing Redis connection');

  const redis = new Redis(url, {
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
  });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return new RedisEmbeddingCache(redis);
}
