import { GoogleGenAI } from '@google/genai';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ConfigurationError, LlmError, toError } from '@verity/shared/src/utils/errors.js';

const log = createChildLogger('llm:gemini');

export interface LanguageModel {
  generate(prompt: string): Promise<string>;
}

export interface GeminiLanguageModelConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly temperature: number;
  readonly timeoutMs: number;
}

export function createGeminiLanguageModel(config: GeminiLanguageModelConfig): LanguageModel {
  if (!config.apiKey) {
    throw new ConfigurationError('GEMINI_API_KEY is required for the Gemini language model');
  }

  const client = new GoogleGenAI({
    apiKey: config.apiKey,
    httpOptions: { timeout: config.timeoutMs },
  });

  log.info({ model: config.model, timeoutMs: config.timeoutMs }, 'Using Gemini language model');

  return {
    async generate(prompt: string): Promise<string> {
      log.debug({ promptLength: prompt.length }, 'Gemini invocation');

      try {
        const response = await client.models.generateContent({
          model: config.model,
          contents: prompt,
          config: { temperature: config.temperature },
        });

        const text = response.text ?? '';
        log.debug({ responseLength: text.length }, 'Gemini invocation complete');
        return text;
      } catch (error) {
        const cause = toError(error);
        throw new LlmError(`Gemini invocation failed: ${cause.message}`, cause);
      }
    },
  };
}
