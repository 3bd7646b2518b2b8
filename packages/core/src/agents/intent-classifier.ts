import type { Intent } from '@verity/shared/src/types/verification.types.js';
import type { Capability } from '@verity/shared/src/utils/capability.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { LlmError, toError } from '@verity/shared/src/utils/errors.js';
import { err, ok, type Result } from '@verity/shared/src/utils/result.js';
import type { LanguageModel } from '../llm/language-model.js';

const log = createChildLogger('agent:intent-classifier');

const CLAIM_LABEL = 'fact_checking_claim';
const QUESTION_LABEL = 'general_question';

export interface IntentClassifier {
  classify(text: string): Promise<Intent>;
}

export interface IntentClassifierDeps {
  readonly languageModel: Capability<LanguageModel>;
  readonly greetings: readonly string[];
}

export function buildIntentPrompt(text: string): string {
  return `Analyze the user input and classify it into exactly one of these categories:
1. ${CLAIM_LABEL}: a statement about the world that can be checked against sources
2. ${QUESTION_LABEL}: anything else, such as a question, a request or small talk

Answer with the category name only.

User Input: "${text}"
Category:`;
}

export function normalizeLabel(raw: string): string {
  return raw.trim().toLowerCase().replace(/["'`‘’“”]/g, '');
}

async function requestLabel(model: LanguageModel, text: string): Promise<Result<string, LlmError>> {
  try {
    return ok(await model.generate(buildIntentPrompt(text)));
  } catch (error) {
    if (error instanceof LlmError) {
      return err(error);
    }
    const cause = toError(error);
    return err(new LlmError(`Intent classification failed: ${cause.message}`, cause));
  }
}

export function createIntentClassifier(deps: IntentClassifierDeps): IntentClassifier {
  const greetings = new Set(deps.greetings.map((greeting) => greeting.trim().toLowerCase()));
  const { languageModel } = deps;

  return {
    async classify(text: string): Promise<Intent> {
      if (greetings.has(text.trim().toLowerCase())) {
        log.info({ intent: 'greeting' }, 'Greeting matched');
        return 'greeting';
      }

      if (languageModel.status === 'unavailable') {
        log.warn(
          { reason: languageModel.reason },
          'Language model unavailable, treating input as a claim',
        );
        return 'fact_checking_claim';
      }

      const response = await requestLabel(languageModel.client, text);
      if (!response.ok) {
        log.error(
          { error: response.error.message },
          'Intent classification failed, treating input as a claim',
        );
        return 'fact_checking_claim';
      }

      const label = normalizeLabel(response.value);
      const intent: Intent = label.includes(CLAIM_LABEL) ? 'fact_checking_claim' : 'general_question';

      log.info({ intent, label }, 'Intent classified');

      return intent;
    },
  };
}
