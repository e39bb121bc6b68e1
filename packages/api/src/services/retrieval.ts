import {
  normalizeL2,
  type Passage,
  type RagSettings,
  type RetrievalResult,
  type ScoredPassage,
} from '@corpus-gate/shared';
import type { Embedder } from '../utils/embeddings';
import { EmbeddingFault } from '../utils/errors';
import { logger } from '../utils/logger';
import type { VectorIndex } from './vectorIndex';

/**
 * Retrieval Service
 *
 * 1. Embed the query with the ingestion model
 * 2. L2-normalise so inner product equals cosine similarity
 * 3. Top-K search over the index
 * 4. Drop passages under the per-passage score floor
 *
 * bestScore is the closest neighbour's score taken BEFORE the floor, and the
 * caller gates on it separately. Both cutoffs use minScore.
 */
export async function retrieve(
  query: string,
  index: VectorIndex,
  passageStore: readonly Passage[],
  embedder: Embedder,
  settings: Pick<RagSettings, 'topK' | 'minScore'>
): Promise<RetrievalResult> {
  const startTime = Date.now();

  const queryVector = normalizeL2(await embedder.embed(query));
  if (queryVector.length !== index.dimension) {
    throw new EmbeddingFault(
      `Embedding service returned dimension ${queryVector.length}, index expects ${index.dimension}`
    );
  }
  const hits = index.search(queryVector, settings.topK);

  const bestScore = hits.length > 0 ? hits[0].score : 0;

  const passages: ScoredPassage[] = [];
  for (const hit of hits) {
    if (hit.score < settings.minScore) {
      continue;
    }
    const passage = passageStore[hit.id];
    if (!passage) {
      throw new Error(`Index position ${hit.id} has no passage record`);
    }
    passages.push({ passage, score: hit.score });
  }

  logger.debug(
    {
      latency: Date.now() - startTime,
      hits: hits.length,
      kept: passages.length,
      bestScore,
    },
    'Retrieval completed'
  );

  return { passages, bestScore };
}
