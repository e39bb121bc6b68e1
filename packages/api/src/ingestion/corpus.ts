import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

const SUPPORTED_EXTENSIONS = ['.txt', '.md'];

export interface CorpusPage {
  text: string;
  page: number;
  source: string;
}

export function isSupportedTextFile(fileName: string): boolean {
  const lowerName = fileName.toLowerCase();
  return SUPPORTED_EXTENSIONS.some((extension) => lowerName.endsWith(extension));
}

/**
 * Split a document into 1-based pages on form feeds, collapsing whitespace.
 * Blank pages are skipped but still advance the page number.
 */
export function splitPages(content: string, source: string): CorpusPage[] {
  const pages: CorpusPage[] = [];

  content.split('\f').forEach((raw, i) => {
    const text = raw.split(/\s+/).filter(Boolean).join(' ');
    if (text) {
      pages.push({ text, page: i + 1, source });
    }
  });

  return pages;
}

/**
 * Read every supported file in dataDir, in file-name order.
 */
export async function readCorpus(dataDir: string): Promise<CorpusPage[]> {
  const entries = await readdir(dataDir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && isSupportedTextFile(entry.name))
    .map((entry) => entry.name)
    .sort();

  const pages: CorpusPage[] = [];
  for (const name of files) {
    const content = await readFile(path.join(dataDir, name), 'utf-8');
    pages.push(...splitPages(content, name));
  }
  return pages;
}
