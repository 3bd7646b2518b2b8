import type { VerifierConfig } from '@verity/schemas/src/config-loader.js';
import { createTextExtractor } from '@verity/ingestion/src/image/processor.js';
import { createIntentClassifier } from './agents/intent-classifier.js';
import { createVerdictSynthesizer } from './agents/verdict-synthesizer.js';
import { createCapabilities, type Capabilities } from './infrastructure/capabilities.js';
import {
  createVerificationPipeline,
  type VerificationPipeline,
} from './orchestration/pipeline.js';
import { createContentFetcher } from './services/content-fetcher/content-fetcher.js';
import { createEvidenceRetriever } from './services/web-search/evidence-retriever.js';

/**
 * Wires every component from a loaded configuration. Pass `capabilities` to replace
 * the external providers, as tests do.
 */
export function createVerifier(
  config: VerifierConfig,
  capabilities: Capabilities = createCapabilities(config),
): VerificationPipeline {
  const { settings } = config;

  return createVerificationPipeline({
    textExtractor: createTextExtractor(capabilities.ocrEngine),
    intentClassifier: createIntentClassifier({
      languageModel: capabilities.languageModel,
      greetings: settings.intent.greetings,
    }),
    evidenceRetriever: createEvidenceRetriever({
      searchProvider: capabilities.searchProvider,
      resultCount: settings.search.resultCount,
    }),
    contentFetcher: createContentFetcher(settings.fetch),
    verdictSynthesizer: createVerdictSynthesizer({
      languageModel: capabilities.languageModel,
      languageRule: settings.synthesis.languageRule,
    }),
    maxSources: settings.search.resultCount,
  });
}
