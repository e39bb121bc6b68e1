import type { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { config } from './config';
import { loadIndex } from './services/indexLoader';
import { HttpEmbedder } from './utils/embeddings';
import { createLLMClient } from './utils/llm';
import { logger } from './utils/logger';
import { createRedisEmbeddingCache, type EmbeddingCache } from './utils/redis';

let app: FastifyInstance | undefined;
let cache: EmbeddingCache | undefined;

async function start() {
  try {
    // Fatal on missing or corrupt artifacts: rerun ingestion.
    const { index, passages } = await loadIndex(config.index.dir, {
      expectedModel: config.embeddings.model,
    });

    cache = config.redis.url ? createRedisEmbeddingCache(config.redis.url) : undefined;

    const embedder = new HttpEmbedder({
      serviceUrl: config.embeddings.serviceUrl,
      model: config.embeddings.model,
      timeoutMs: config.embeddings.timeoutMs,
      cache,
      cacheTtl: config.embeddings.cacheTtl,
    });

    const llm = createLLMClient(config.generation);
    logger.info(
      { provider: config.generation.provider, model: llm.model },
      'Generation client configured'
    );

    app = await buildApp(
      { index, passages, embedder, llm, settings: config.rag, cache },
      { logger: { level: config.logLevel }, corsOrigins: [...config.corsOrigins] }
    );

    await app.listen({
      port: config.port,
      host: config.host,
    });

    logger.info(`API server running at http://${config.host}:${config.port}`);
  } catch (err) {
    logger.fatal(err, 'Failed to start server');
    process.exit(1);
  }
}

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully...`);
  await app?.close();
  await cache?.close();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

void start();
