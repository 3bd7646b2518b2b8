import { createChildLogger } from '@verity/shared/src/logger.js';
import type { LanguageModel } from './language-model.js';

const log = createChildLogger('llm:mock');

function createMockResponse(prompt: string): string {
  const lower = prompt.toLowerCase();

  if (lower.includes('classify')) {
    return 'fact_checking_claim';
  }

  if (lower.includes('verdict:')) {
    return [
      'Language: English',
      'Verdict: Unverified',
      '',
      'This is a mock analysis. The retrieved sources were not assessed by a real model.',
    ].join('\n');
  }

  return 'Mock language model response';
}

export function createMockLanguageModel(): LanguageModel {
  log.info('Using mock language model');

  return {
    generate(prompt: string): Promise<string> {
      log.debug({ promptLength: prompt.length }, 'Mock language model invocation');
      return Promise.resolve(createMockResponse(prompt));
    },
  };
}
