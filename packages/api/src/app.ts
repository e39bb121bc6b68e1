import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { generateRequestId, type Passage, type RagSettings } from '@corpus-gate/shared';
import { healthRoutes } from './routes/health';
import { queryRoutes } from './routes/query';
import type { VectorIndex } from './services/vectorIndex';
import type { Embedder } from './utils/embeddings';
import type { LLMClient } from './utils/llm';
import type { EmbeddingCache } from './utils/redis';

/**
 * Everything a request needs, built once at startup and shared read-only
 * across requests.
 */
export interface ServiceContext {
  index: VectorIndex;
  passages: readonly Passage[];
  embedder: Embedder;
  llm: LLMClient;
  settings: RagSettings;
  cache?: EmbeddingCache;
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
}

export async function buildApp(
  service: ServiceContext,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
    requestIdLogLabel: 'reqId',
    requestIdHeader: 'x-request-id',
    genReqId: () => generateRequestId(),
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: options.corsOrigins ?? false,
    credentials: true,
  });

  await fastify.register(healthRoutes, { prefix: '/health', service });
  await fastify.register(queryRoutes, { prefix: '/api/v1/query', service });

  return fastify;
}
