import { CHUNKING_CONFIG } from '@corpus-gate/shared';

export type ChunkOptions = {
  chunkSize?: number;
  overlap?: number;
};

/**
 * Fixed-size character windows; each window starts `overlap` characters
 * before the previous one ended. The last window ends at the text's end.
 */
export function chunkText(text: string, options: ChunkOptions = {}): string[] {
  const chunkSize = options.chunkSize ?? CHUNKING_CONFIG.CHUNK_SIZE;
  const overlap = options.overlap ?? CHUNKING_CONFIG.CHUNK_OVERLAP;

  if (chunkSize <= 0) {
    throw new Error('chunkSize must be greater than 0');
  }
  if (overlap < 0 || overlap >= chunkSize) {
    throw new Error('overlap must be >= 0 and less than chunkSize');
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    const end = Math.min(start + chunkSize, text.length);
    chunks.push(text.slice(start, end));
    if (end === text.length) {
      break;
    }
    start = end - overlap;
  }

  return chunks;
}
