import type { BaseLogger } from 'pino';
import type {
  AnswerStructure,
  Context,
  Passage,
  RagSettings,
  RefusalDecision,
  RefusalGate,
  RetrievalResult,
} from '@corpus-gate/shared';
import type { Embedder } from '../utils/embeddings';
import type { LLMClient } from '../utils/llm';
import { logger as defaultLogger } from '../utils/logger';
import { buildContext } from './context';
import { refusalDecision, refuse, isSelfRefusal } from './refusal';
import { retrieve } from './retrieval';
import { isSupportedByContext } from './supportVerifier';
import { generateAnswer, inspectAnswerStructure } from './synthesis';
import { isRefused } from './topicGate';
import type { VectorIndex } from './vectorIndex';

/**
 * Query Pipeline
 *
 * START -> TOPIC_CHECK -> RETRIEVE -> SCORE_CHECK -> SUPPORT_CHECK
 *       -> ASSEMBLE_CONTEXT -> GENERATE -> SELF_REFUSAL_CHECK -> ANSWERED
 *
 * Any check may end the run in REFUSED. No stage is revisited and nothing is
 * retried. A generator failure is thrown as GeneratorFault, not refused.
 */

const STAGE_BY_GATE: Record<RefusalGate, string> = {
  'topic-gate': 'TOPIC_CHECK',
  'score-threshold': 'SCORE_CHECK',
  'support-verifier': 'SUPPORT_CHECK',
  'generator-self-refusal': 'SELF_REFUSAL_CHECK',
};

export interface PipelineDeps {
  index: VectorIndex;
  passages: readonly Passage[];
  embedder: Embedder;
  llm: LLMClient;
  settings: RagSettings;
  log?: Pick<BaseLogger, 'info' | 'debug'>;
}

export interface StageTimings {
  retrieval: number;
  generation: number;
  total: number;
}

export type PipelineOutcome =
  | {
      status: 'refused';
      message: string;
      decision: RefusalDecision;
      retrieval?: RetrievalResult;
      timings: StageTimings;
    }
  | {
      status: 'answered';
      answer: string;
      retrieval: RetrievalResult;
      context: Context;
      structure: AnswerStructure;
      timings: StageTimings;
    };

export async function runQueryPipeline(
  query: string,
  deps: PipelineDeps
): Promise<PipelineOutcome> {
  const log = deps.log ?? defaultLogger;
  const startTime = Date.now();
  const timings: StageTimings = { retrieval: 0, generation: 0, total: 0 };

  const refusal = (gate: RefusalGate, retrieval?: RetrievalResult): PipelineOutcome => {
    timings.total = Date.now() - startTime;
    log.info({ gate, stage: STAGE_BY_GATE[gate], bestScore: retrieval?.bestScore }, 'Query refused');
    return {
      status: 'refused',
      message: refuse(),
      decision: refusalDecision(gate),
      ...(retrieval && { retrieval }),
      timings,
    };
  };

  // TOPIC_CHECK
  if (isRefused(query)) {
    return refusal('topic-gate');
  }

  // RETRIEVE
  const retrievalStart = Date.now();
  const retrieval = await retrieve(query, deps.index, deps.passages, deps.embedder, deps.settings);
  timings.retrieval = Date.now() - retrievalStart;

  // SCORE_CHECK
  if (retrieval.bestScore < deps.settings.minScore || retrieval.passages.length === 0) {
    return refusal('score-threshold', retrieval);
  }

  // SUPPORT_CHECK
  const ranked = retrieval.passages.map((scored) => scored.passage);
  if (!isSupportedByContext(query, ranked)) {
    return refusal('support-verifier', retrieval);
  }

  // ASSEMBLE_CONTEXT
  const context = buildContext(retrieval.passages, deps.settings.maxContextChars);

  // GENERATE
  const generationStart = Date.now();
  const answer = await generateAnswer(query, context.text, deps.llm);
  timings.generation = Date.now() - generationStart;

  // SELF_REFUSAL_CHECK
  if (isSelfRefusal(answer)) {
    return refusal('generator-self-refusal', retrieval);
  }

  const structure = inspectAnswerStructure(answer);
  timings.total = Date.now() - startTime;

  log.info(
    {
      bestScore: retrieval.bestScore,
      passagesRetrieved: retrieval.passages.length,
      passagesInContext: context.passages.length,
      structure,
    },
    'Query answered'
  );

  return { status: 'answered', answer, retrieval, context, structure, timings };
}
