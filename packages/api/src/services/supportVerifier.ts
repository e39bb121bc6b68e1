import type { Passage } from '@corpus-gate/shared';

/**
 * Support Verifier
 *
 * Lexical check that the retrieved passages literally contain terms from the
 * query. An empty term set cannot be verified and counts as unsupported.
 */

export const STOPWORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'to', 'of', 'in', 'on', 'for', 'with', 'is', 'are', 'was', 'were',
  'what', 'why', 'how', 'does', 'do', 'did', 'should', 'can', 'could', 'would', 'i', 'you', 'we',
  'my', 'your', 'our', 'me', 'it', 'this', 'that', 'these', 'those',
]);

/**
 * Distinct alphabetic tokens of three or more letters, lower-cased,
 * stopwords removed.
 */
export function extractContentTerms(text: string): Set<string> {
  const tokens = text.toLowerCase().match(/[a-z]{3,}/g) ?? [];
  return new Set(tokens.filter((token) => !STOPWORDS.has(token)));
}

/**
 * Short queries (up to 4 terms) need one hit; longer ones need two.
 */
export function requiredHits(termCount: number): number {
  return termCount <= 4 ? 1 : 2;
}

export function isSupportedByContext(
  query: string,
  passages: ReadonlyArray<Pick<Passage, 'text'>>
): boolean {
  const terms = extractContentTerms(query);
  if (terms.size === 0) {
    return false;
  }

  const haystack = passages.map((p) => p.text).join(' ').toLowerCase();
  let hits = 0;
  for (const term of terms) {
    if (haystack.includes(term)) {
      hits++;
    }
  }

  return hits >= requiredHits(terms.size);
}
