import { config } from '../config';
import { buildIndexArtifacts, writeIndexArtifacts } from '../ingestion/build';
import { readCorpus } from '../ingestion/corpus';
import { HttpEmbedder } from '../utils/embeddings';
import { logger } from '../utils/logger';

/**
 * Rebuild the index from the text files in DATA_DIR.
 * The server must be restarted to pick up the new artifacts.
 */
async function main() {
  const pages = await readCorpus(config.index.dataDir);
  const sources = new Set(pages.map((page) => page.source));

  const embedder = new HttpEmbedder({
    serviceUrl: config.embeddings.serviceUrl,
    model: config.embeddings.model,
    timeoutMs: config.embeddings.timeoutMs,
  });

  const artifacts = await buildIndexArtifacts(pages, embedder, {
    chunkSize: config.ingestion.chunkSize,
    overlap: config.ingestion.chunkOverlap,
  });
  await writeIndexArtifacts(config.index.dir, artifacts);

  logger.info(
    { chunks: artifacts.chunks.length, documents: sources.size, indexDir: config.index.dir },
    'Index written'
  );
}

main().catch((err) => {
  logger.fatal(err, 'Ingestion failed');
  process.exit(1);
});
