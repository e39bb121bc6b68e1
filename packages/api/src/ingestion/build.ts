import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  INDEX_FILES,
  normalizeL2,
  type ChunkRecord,
  type VectorIndexFile,
} from '@corpus-gate/shared';
import type { Embedder } from '../utils/embeddings';
import { logger } from '../utils/logger';
import { chunkText, type ChunkOptions } from './chunker';
import type { CorpusPage } from './corpus';

export interface IndexArtifacts {
  vectors: VectorIndexFile;
  chunks: ChunkRecord[];
}

/**
 * Chunk, embed and normalise the corpus. Row i of the vectors pairs with
 * chunk record i.
 */
export async function buildIndexArtifacts(
  pages: readonly CorpusPage[],
  embedder: Embedder,
  options: ChunkOptions = {}
): Promise<IndexArtifacts> {
  const chunks: ChunkRecord[] = [];
  for (const page of pages) {
    for (const chunk of chunkText(page.text, options)) {
      chunks.push({ chunk, page: page.page, source: page.source });
    }
  }

  if (chunks.length === 0) {
    throw new Error('No text extracted. Check the files in the data directory.');
  }

  const vectors: number[][] = [];
  for (const [i, record] of chunks.entries()) {
    vectors.push(normalizeL2(await embedder.embed(record.chunk)));
    if ((i + 1) % 100 === 0) {
      logger.info({ embedded: i + 1, total: chunks.length }, 'Embedding progress');
    }
  }

  const dimension = vectors[0].length;
  if (vectors.some((vector) => vector.length !== dimension)) {
    throw new Error('Embedding service returned vectors of differing dimensions');
  }

  return {
    vectors: { model: embedder.model, dimension, vectors },
    chunks,
  };
}

export async function writeIndexArtifacts(indexDir: string, artifacts: IndexArtifacts): Promise<void> {
  await mkdir(indexDir, { recursive: true });
  await writeFile(path.join(indexDir, INDEX_FILES.VECTORS), JSON.stringify(artifacts.vectors));
  await writeFile(
    path.join(indexDir, INDEX_FILES.CHUNKS),
    JSON.stringify(artifacts.chunks, null, 2)
  );
}
