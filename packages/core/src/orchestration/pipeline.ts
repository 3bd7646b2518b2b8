import { randomUUID } from 'node:crypto';
import { StateGraph, START, END } from '@langchain/langgraph';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { toError } from '@verity/shared/src/utils/errors.js';
import type { TextExtractor } from '@verity/ingestion/src/image/types.js';
import type { IntentClassifier } from '../agents/intent-classifier.js';
import type { VerdictSynthesizer } from '../agents/verdict-synthesizer.js';
import type { EvidenceRetriever } from '../services/web-search/types.js';
import type { ContentFetcher } from '../services/content-fetcher/content-fetcher.js';
import { collectEvidence } from '../services/evidence/evidence-collector.js';
import {
  GENERAL_QUESTION_MESSAGE,
  GREETING_MESSAGE,
  INTERNAL_ERROR_MESSAGE,
  NO_IMAGE_TEXT_MESSAGE,
  NO_INPUT_MESSAGE,
} from '../messages.js';
import { PipelineGraphAnnotation, type PipelineGraphState } from './pipeline-state.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineDeps {
  readonly textExtractor: TextExtractor;
  readonly intentClassifier: IntentClassifier;
  readonly evidenceRetriever: EvidenceRetriever;
  readonly contentFetcher: ContentFetcher;
  readonly verdictSynthesizer: VerdictSynthesizer;
  readonly maxSources: number;
}

export interface VerificationPipeline {
  handle(userText?: string, imageBytes?: Buffer): Promise<string>;
}

type PipelineNode = (state: PipelineGraphState) => Promise<Partial<PipelineGraphState>>;

function createResolveTextNode(textExtractor: TextExtractor): PipelineNode {
  return async (state) => {
    const { imageBytes, userText } = state.input;

    // An attached image replaces any typed text.
    if (imageBytes) {
      if (userText !== undefined && userText.trim().length > 0) {
        log.debug({ requestId: state.requestId }, 'Image supplied, ignoring typed text');
      }
      const extracted = await textExtractor.extractText(imageBytes);
      if (extracted === null) {
        log.info({ requestId: state.requestId }, 'No text read from image');
        return { response: NO_IMAGE_TEXT_MESSAGE };
      }
      return { claim: extracted };
    }

    const claim = (userText ?? '').trim();
    if (claim.length === 0) {
      return { response: NO_INPUT_MESSAGE };
    }
    return { claim };
  };
}

function createClassifyIntentNode(intentClassifier: IntentClassifier): PipelineNode {
  return async (state) => ({ intent: await intentClassifier.classify(state.claim ?? '') });
}

function createRetrieveNode(deps: PipelineDeps): PipelineNode {
  return async (state) => {
    const searchResults = await deps.evidenceRetriever.search(state.claim ?? '');
    const evidence = await collectEvidence(searchResults, deps.contentFetcher, deps.maxSources);
    return { searchResults, evidence };
  };
}

function createSynthesizeNode(verdictSynthesizer: VerdictSynthesizer): PipelineNode {
  return async (state) => ({
    response: await verdictSynthesizer.synthesize(
      state.claim ?? '',
      state.evidence ?? { entries: [], sourceUrls: [] },
    ),
  });
}

function routeAfterResolve(state: PipelineGraphState): string {
  return state.response === undefined ? 'classifyIntent' : '__end__';
}

function routeAfterIntent(state: PipelineGraphState): string {
  switch (state.intent) {
    case 'greeting':
      return 'greet';
    case 'general_question':
      return 'decline';
    default:
      return 'retrieve';
  }
}

export function createVerificationPipeline(deps: PipelineDeps): VerificationPipeline {
  log.info({ maxSources: deps.maxSources }, 'Initializing verification pipeline');

  const graph = new StateGraph(PipelineGraphAnnotation)
    .addNode('resolveText', createResolveTextNode(deps.textExtractor))
    .addNode('classifyIntent', createClassifyIntentNode(deps.intentClassifier))
    .addNode('greet', () => Promise.resolve({ response: GREETING_MESSAGE }))
    .addNode('decline', () => Promise.resolve({ response: GENERAL_QUESTION_MESSAGE }))
    .addNode('retrieve', createRetrieveNode(deps))
    .addNode('synthesize', createSynthesizeNode(deps.verdictSynthesizer))
    .addEdge(START, 'resolveText')
    .addConditionalEdges('resolveText', routeAfterResolve, {
      classifyIntent: 'classifyIntent',
      __end__: END,
    })
    .addConditionalEdges('classifyIntent', routeAfterIntent, {
      greet: 'greet',
      decline: 'decline',
      retrieve: 'retrieve',
    })
    .addEdge('greet', END)
    .addEdge('decline', END)
    .addEdge('retrieve', 'synthesize')
    .addEdge('synthesize', END)
    .compile();

  return {
    async handle(userText?: string, imageBytes?: Buffer): Promise<string> {
      const requestId = randomUUID();
      log.info(
        { requestId, textLength: userText?.length ?? 0, imageBytes: imageBytes?.length ?? 0 },
        'Handling verification request',
      );

      try {
        const result = await graph.invoke({
          requestId,
          input: { userText, imageBytes },
          claim: undefined,
          intent: undefined,
          searchResults: [],
          evidence: undefined,
          response: undefined,
        });

        log.info(
          { requestId, intent: result.intent, sources: result.evidence?.entries.length ?? 0 },
          'Verification request complete',
        );

        return result.response ?? INTERNAL_ERROR_MESSAGE;
      } catch (error) {
        log.error({ requestId, error: toError(error).message }, 'Verification pipeline failed');
        return INTERNAL_ERROR_MESSAGE;
      }
    },
  };
}
