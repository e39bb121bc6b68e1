import { REFUSAL_TEXT, type AnswerStructure } from '@corpus-gate/shared';
import { GeneratorFault } from '../utils/errors';
import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';

/**
 * Answer Synthesis Service
 *
 * STRICT GROUNDING POLICY:
 * - Answer ONLY from the assembled context
 * - No external knowledge, biography, history or therapy
 * - Refuse with the canonical refusal text, verbatim
 * - Exactly two sections: explanation with one short quote, then one question
 */

export const SYSTEM_RULES = `You are a constrained philosophical agent representing Existentialism, and you are STRICTLY LIMITED to the provided context passages.
You MUST NOT use any external knowledge, biography, dates, history, psychology/therapy, clinical language, or modern frameworks.
If the context does not directly support the answer, you MUST refuse.

REFUSAL RULE:
If you cannot point to the provided context as evidence for your answer, respond ONLY with:
"${REFUSAL_TEXT}"

STYLE:
Be concise, intellectually playful (dry existential humor is allowed), and Socratic.
You are not a therapist. No advice.

MANDATORY OUTPUT STRUCTURE (NON-NEGOTIABLE):

If you answer (i.e., do not refuse), your response MUST contain EXACTLY TWO sections:

[SECTION 1] Explanation
- Explain using ONLY the context passages.
- Do NOT import external definitions or examples.
- Include EXACTLY ONE short quote (25 words or fewer) taken directly from the context passages.
- If a source tag (filename/page) is present, include it.

[SECTION 2] Question:
- Write EXACTLY ONE reflective question.
- The question must end with a question mark (?).
- The question must relate to the concept explained in Section 1.
- Do NOT give advice, therapy, or prescriptions.`;

export function buildPrompt(query: string, context: string): string {
  return `${SYSTEM_RULES}

User question: ${query}

Context passages (ONLY allowed source):
${context}

Now respond following the mandatory structure.`;
}

/**
 * Call the generation collaborator. Anything that goes wrong on the way is a
 * GeneratorFault, never a refusal.
 */
export async function generateAnswer(
  query: string,
  context: string,
  llm: LLMClient
): Promise<string> {
  const startTime = Date.now();

  try {
    const answer = (await llm.generate(buildPrompt(query, context), { temperature: 0.1 })).trim();

    logger.info(
      { latency: Date.now() - startTime, model: llm.model, chars: answer.length },
      'Answer synthesis completed'
    );
    return answer;
  } catch (error) {
    logger.error({ error }, 'Answer synthesis failed');
    if (error instanceof GeneratorFault) {
      throw error;
    }
    throw new GeneratorFault('Generation failed', { cause: error });
  }
}

/**
 * Check the answer against the two-section contract. Informational only:
 * a malformed answer is logged, not refused.
 */
export function inspectAnswerStructure(answer: string): AnswerStructure {
  const explanationMatch = /\[SECTION 1\]|\bexplanation\b/i.exec(answer);
  const questionMatch = /\[SECTION 2\]|\bquestion:/i.exec(answer);

  let questionEndsWithMark = false;
  if (questionMatch) {
    const questionSection = answer.slice(questionMatch.index + questionMatch[0].length).trim();
    questionEndsWithMark = questionSection.endsWith('?');
  }

  return {
    hasExplanation: explanationMatch !== null,
    hasQuestion: questionMatch !== null,
    questionEndsWithMark,
  };
}
