import type { VerifierConfig } from '@verity/schemas/src/config-loader.js';
import { createTesseractOcrEngine } from '@verity/ingestion/src/image/tesseract-ocr-engine.js';
import type { OcrEngine } from '@verity/ingestion/src/image/types.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import {
  configured,
  unavailable,
  type Capability,
} from '@verity/shared/src/utils/capability.js';
import { createGeminiLanguageModel, type LanguageModel } from '../llm/language-model.js';
import { createMockLanguageModel } from '../llm/mock-language-model.js';
import { createGoogleSearchProvider } from '../services/web-search/google-search-provider.js';
import { createMockSearchProvider } from '../services/web-search/mock-search-provider.js';
import type { SearchProvider } from '../services/web-search/types.js';

const log = createChildLogger('infrastructure:capabilities');

export interface Capabilities {
  readonly searchProvider: Capability<SearchProvider>;
  readonly languageModel: Capability<LanguageModel>;
  readonly ocrEngine: OcrEngine;
}

function resolveSearchProvider(config: VerifierConfig): Capability<SearchProvider> {
  if (config.mockProviders) {
    return configured(createMockSearchProvider());
  }

  const { googleApiKey, searchEngineId } = config.credentials;
  if (!googleApiKey || !searchEngineId) {
    return unavailable('GOOGLE_API_KEY and SEARCH_ENGINE_ID must both be set');
  }

  return configured(
    createGoogleSearchProvider({
      apiKey: googleApiKey,
      searchEngineId,
      timeoutMs: config.settings.search.timeoutMs,
    }),
  );
}

function resolveLanguageModel(config: VerifierConfig): Capability<LanguageModel> {
  if (config.mockProviders) {
    return configured(createMockLanguageModel());
  }

  const { geminiApiKey } = config.credentials;
  if (!geminiApiKey) {
    return unavailable('GEMINI_API_KEY is not set');
  }

  return configured(
    createGeminiLanguageModel({
      apiKey: geminiApiKey,
      model: config.settings.llm.model,
      temperature: config.settings.llm.temperature,
      timeoutMs: config.settings.llm.timeoutMs,
    }),
  );
}

/** Decides once which external providers this process can use. */
export function createCapabilities(config: VerifierConfig): Capabilities {
  const capabilities: Capabilities = {
    searchProvider: resolveSearchProvider(config),
    languageModel: resolveLanguageModel(config),
    ocrEngine: createTesseractOcrEngine({
      language: config.settings.ocr.language,
      timeoutMs: config.settings.ocr.timeoutMs,
      langPath: config.ocrLangPath,
    }),
  };

  log.info(
    {
      search: capabilities.searchProvider.status,
      languageModel: capabilities.languageModel.status,
      mockProviders: config.mockProviders,
    },
    'Capabilities resolved',
  );

  return capabilities;
}
