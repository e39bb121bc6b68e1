import type { FastifyPluginAsync } from 'fastify';
import type { ServiceContext } from '../app';

export interface HealthRoutesOptions {
  service: ServiceContext;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, opts) => {
  const { service } = opts;

  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'corpus-gate-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const indexReady = service.index.size > 0;
    const redis = service.cache ? ((await service.cache.ping()) ? 'ok' : 'down') : 'disabled';
    const ready = indexReady && redis !== 'down';

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks: {
        index: indexReady ? 'ok' : 'empty',
        passages: service.passages.length,
        embeddingModel: service.embedder.model,
        generationModel: service.llm.model,
        redis,
      },
    });
  });
};
