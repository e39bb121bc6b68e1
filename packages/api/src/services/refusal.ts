import { REFUSAL_TEXT, type RefusalDecision, type RefusalGate } from '@corpus-gate/shared';

/**
 * Refusal Policy
 *
 * Every gate returns the same text, so a caller cannot tell which one fired.
 * The gate is kept on the decision for logs and tests only.
 */
export function refuse(): string {
  return REFUSAL_TEXT;
}

export function refusalDecision(gate: RefusalGate): RefusalDecision {
  return { refused: true, gate };
}

/**
 * Exact match after trimming; a paraphrased refusal is treated as an answer.
 */
export function isSelfRefusal(output: string): boolean {
  return output.trim() === REFUSAL_TEXT.trim();
}
