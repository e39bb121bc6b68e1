import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { INDEX_FILES, type Passage } from '@corpus-gate/shared';
import { IndexLoadFault } from '../utils/errors';
import { logger } from '../utils/logger';
import { FlatInnerProductIndex, type VectorIndex } from './vectorIndex';

/**
 * Loads the two ingestion artifacts and checks that they agree.
 * Position i in vectors.json pairs with position i in chunks.json.
 */

const VectorIndexFileSchema = z.object({
  model: z.string().min(1),
  dimension: z.number().int().positive(),
  vectors: z.array(z.array(z.number())),
});

const ChunkRecordSchema = z.object({
  chunk: z.string(),
  page: z.number().int().positive(),
  source: z.string().min(1),
});

const ChunksFileSchema = z.array(ChunkRecordSchema);

export interface LoadedIndex {
  model: string;
  index: VectorIndex;
  passages: readonly Passage[];
}

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new IndexLoadFault(`Cannot read ${filePath}; run ingestion first`, { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new IndexLoadFault(`${filePath} is not valid JSON`, { cause: error });
  }
}

export async function loadIndex(
  indexDir: string,
  options: { expectedModel?: string } = {}
): Promise<LoadedIndex> {
  const vectorsPath = path.join(indexDir, INDEX_FILES.VECTORS);
  const chunksPath = path.join(indexDir, INDEX_FILES.CHUNKS);

  const vectorsFile = VectorIndexFileSchema.safeParse(await readJson(vectorsPath));
  if (!vectorsFile.success) {
    throw new IndexLoadFault(`${vectorsPath} is corrupt: ${vectorsFile.error.issues[0]?.message}`);
  }

  const chunksFile = ChunksFileSchema.safeParse(await readJson(chunksPath));
  if (!chunksFile.success) {
    throw new IndexLoadFault(`${chunksPath} is corrupt: ${chunksFile.error.issues[0]?.message}`);
  }

  const { model, dimension, vectors } = vectorsFile.data;
  const chunks = chunksFile.data;

  if (vectors.length !== chunks.length) {
    throw new IndexLoadFault(
      `Index has ${vectors.length} vectors but ${chunks.length} passages`
    );
  }

  if (options.expectedModel && options.expectedModel !== model) {
    throw new IndexLoadFault(
      `Index was built with ${model} but the configured embedding model is ${options.expectedModel}`
    );
  }

  let index: VectorIndex;
  try {
    index = new FlatInnerProductIndex(dimension, vectors);
  } catch (error) {
    throw new IndexLoadFault(`${vectorsPath} is corrupt`, { cause: error });
  }

  const passages: Passage[] = chunks.map((record, position) =>
    Object.freeze({
      text: record.chunk,
      sourceDocument: record.source,
      pageNumber: record.page,
      embedding: Object.freeze(vectors[position]),
    })
  );

  logger.info({ indexDir, model, dimension, passages: passages.length }, 'Index loaded');

  return { model, index, passages: Object.freeze(passages) };
}
