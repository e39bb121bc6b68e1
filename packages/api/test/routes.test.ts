import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { REFUSAL_TEXT } from '@corpus-gate/shared';
import { buildApp, type ServiceContext } from '../src/app';
import { FlatInnerProductIndex } from '../src/services/vectorIndex';
import { EmbeddingFault, GeneratorFault } from '../src/utils/errors';
import {
  MemoryEmbeddingCache,
  PASSAGES,
  SETTINGS,
  WELL_FORMED_ANSWER,
  fakeEmbedder,
  stubLLM,
} from './helpers';

const QUERY = 'What does Sartre mean by abandonment?';

function makeService(overrides: Partial<ServiceContext> = {}): ServiceContext {
  return {
    index: new FlatInnerProductIndex(
      3,
      PASSAGES.map((passage) => passage.embedding)
    ),
    passages: PASSAGES,
    embedder: fakeEmbedder({ [QUERY]: [1, 0, 0] }),
    llm: stubLLM(),
    settings: SETTINGS,
    ...overrides,
  };
}

describe('routes', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('returns an answer with sources and metadata', async () => {
    app = await buildApp(makeService());

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: { 'x-request-id': 'req-test-1' },
      payload: { query: QUERY },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.requestId).toBe('req-test-1');
    expect(body.status).toBe('answered');
    expect(body.answer).toBe(WELL_FORMED_ANSWER);
    expect(body.sources).toEqual([
      { sourceDocument: 'existentialism-humanism.txt', pageNumber: 3, score: 1 },
    ]);
    expect(body.metadata).toMatchObject({
      bestScore: 1,
      minScore: 0.25,
      passagesRetrieved: 1,
      passagesInContext: 1,
    });
    expect(body.context).toBeUndefined();
  });

  it('includes the context and structure check in debug mode', async () => {
    app = await buildApp(makeService());

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: QUERY, options: { includeDebug: true } },
    });

    const body = res.json();
    expect(body.context).toBe(
      '[existentialism-humanism.txt p.3] Sartre describes abandonment as the discovery that we are left alone to choose.'
    );
    expect(body.structure).toEqual({
      hasExplanation: true,
      hasQuestion: true,
      questionEndsWithMark: true,
    });
  });

  it('returns only the refusal text when a gate refuses', async () => {
    app = await buildApp(makeService());

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: { 'x-request-id': 'req-test-2' },
      payload: { query: 'Compare existentialism to Buddhism', options: { includeDebug: true } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      requestId: 'req-test-2',
      query: 'Compare existentialism to Buddhism',
      status: 'refused',
      answer: REFUSAL_TEXT,
    });
  });

  it('returns the same refusal body for a generator self-refusal', async () => {
    app = await buildApp(makeService({ llm: stubLLM(REFUSAL_TEXT) }));

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: { 'x-request-id': 'req-test-3' },
      payload: { query: QUERY },
    });

    expect(res.json()).toEqual({
      requestId: 'req-test-3',
      query: QUERY,
      status: 'refused',
      answer: REFUSAL_TEXT,
    });
  });

  it('rejects an empty query', async () => {
    app = await buildApp(makeService());

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: '   ' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Invalid request');
  });

  it('reports a generator fault as 502, not as a refusal', async () => {
    const llm = stubLLM();
    llm.generate.mockRejectedValue(new GeneratorFault('Generation timed out after 120000ms'));
    app = await buildApp(makeService({ llm }));

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      headers: { 'x-request-id': 'req-test-4' },
      payload: { query: QUERY },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ error: 'Generation service unavailable', requestId: 'req-test-4' });
  });

  it('reports an embedding fault as 503', async () => {
    const embedder = fakeEmbedder();
    embedder.embed.mockRejectedValue(new EmbeddingFault('Embedding service returned 500'));
    app = await buildApp(makeService({ embedder }));

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: QUERY },
    });

    expect(res.statusCode).toBe(503);
    expect(res.json().error).toBe('Embedding service unavailable');
  });

  it('serves liveness', async () => {
    app = await buildApp(makeService());

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', service: 'corpus-gate-api' });
  });

  it('reports readiness with index and cache checks', async () => {
    const cache = new MemoryEmbeddingCache();
    app = await buildApp(makeService({ cache }));

    const ready = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({
      status: 'ready',
      checks: {
        index: 'ok',
        passages: 3,
        embeddingModel: 'test-embedding-model',
        generationModel: 'test-llm',
        redis: 'ok',
      },
    });

    cache.healthy = false;
    const notReady = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(notReady.statusCode).toBe(503);
    expect(notReady.json().checks.redis).toBe('down');
  });

  it('is not ready with an empty index', async () => {
    app = await buildApp(makeService({ index: new FlatInnerProductIndex(3, []), passages: [] }));

    const res = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(res.statusCode).toBe(503);
    expect(res.json().checks).toMatchObject({ index: 'empty', redis: 'disabled' });
  });
});
