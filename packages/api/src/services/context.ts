import type { Context, ScoredPassage } from '@corpus-gate/shared';

const SEPARATOR = '\n\n';

export function formatSnippet({ passage }: ScoredPassage): string {
  return `[${passage.sourceDocument} p.${passage.pageNumber}] ${passage.text}`;
}

/**
 * Concatenate passages in rank order until the next whole snippet would
 * overflow maxChars. Separators count toward the budget.
 */
export function buildContext(ranked: readonly ScoredPassage[], maxChars: number): Context {
  const snippets: string[] = [];
  const included: ScoredPassage[] = [];
  let total = 0;

  for (const scored of ranked) {
    const snippet = formatSnippet(scored);
    const cost = snippet.length + (snippets.length > 0 ? SEPARATOR.length : 0);
    if (total + cost > maxChars) {
      break;
    }
    snippets.push(snippet);
    included.push(scored);
    total += cost;
  }

  return { text: snippets.join(SEPARATOR), passages: included };
}
