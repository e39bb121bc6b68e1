import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  LATENCY_BUDGETS,
  checkLatencyBudget,
  type QueryResponse,
} from '@corpus-gate/shared';
import { runQueryPipeline, type PipelineOutcome } from '../services/pipeline';
import { EmbeddingFault, GeneratorFault } from '../utils/errors';
import type { ServiceContext } from '../app';

const QueryRequestSchema = z.object({
  query: z.string().trim().min(1).max(1000),
  options: z.object({
    includeDebug: z.boolean().optional(),
  }).optional(),
});

export interface QueryRoutesOptions {
  service: ServiceContext;
}

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (fastify, opts) => {
  const { service } = opts;

  /**
   * POST /api/v1/query
   *
   * Refusals are 200s carrying the canonical refusal text and nothing else,
   * whichever gate fired. Generator and embedding failures are errors.
   */
  fastify.post('/', async (request, reply) => {
    const requestId = request.id;

    const validation = QueryRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    const { query, options } = validation.data;
    request.log.info({ requestId, query }, 'Processing query');

    let outcome: PipelineOutcome;
    try {
      outcome = await runQueryPipeline(query, {
        index: service.index,
        passages: service.passages,
        embedder: service.embedder,
        llm: service.llm,
        settings: service.settings,
        log: request.log,
      });
    } catch (error) {
      if (error instanceof GeneratorFault) {
        request.log.error({ requestId, error, status: error.status }, 'Generation failed');
        return reply.code(502).send({
          error: 'Generation service unavailable',
          requestId,
        });
      }
      if (error instanceof EmbeddingFault) {
        request.log.error({ requestId, error }, 'Embedding generation failed');
        return reply.code(503).send({
          error: 'Embedding service unavailable',
          requestId,
        });
      }
      request.log.error({ requestId, error }, 'Query processing failed');
      return reply.code(500).send({
        error: 'Internal server error',
        requestId,
      });
    }

    if (outcome.status === 'refused') {
      const response: QueryResponse = {
        requestId,
        query,
        status: 'refused',
        answer: outcome.message,
      };
      return response;
    }

    const { timings } = outcome;
    const latencyBudgetViolations = [
      checkLatencyBudget(timings.retrieval, LATENCY_BUDGETS.RETRIEVAL, 'retrieval'),
      checkLatencyBudget(timings.generation, LATENCY_BUDGETS.GENERATION, 'generation'),
      checkLatencyBudget(timings.total, LATENCY_BUDGETS.TOTAL, 'total'),
    ].flatMap((check) => (check.violation ? [check.violation] : []));

    if (latencyBudgetViolations.length > 0) {
      request.log.warn({ requestId, latencyBudgetViolations }, 'Latency budget exceeded');
    }

    const response: QueryResponse = {
      requestId,
      query,
      status: 'answered',
      answer: outcome.answer,
      sources: outcome.retrieval.passages.map(({ passage, score }) => ({
        sourceDocument: passage.sourceDocument,
        pageNumber: passage.pageNumber,
        score,
      })),
      ...(options?.includeDebug && {
        context: outcome.context.text,
        structure: outcome.structure,
      }),
      metadata: {
        bestScore: outcome.retrieval.bestScore,
        minScore: service.settings.minScore,
        passagesRetrieved: outcome.retrieval.passages.length,
        passagesInContext: outcome.context.passages.length,
        latency: timings,
        latencyBudgetViolations,
      },
    };

    request.log.info({ requestId, totalLatency: timings.total }, 'Query processed successfully');
    return response;
  });
};
