import {
  VERDICT_LABELS,
  type EvidenceBundle,
  type VerdictLabel,
} from '@verity/shared/src/types/verification.types.js';
import type { Capability } from '@verity/shared/src/utils/capability.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { LlmError, toError } from '@verity/shared/src/utils/errors.js';
import { err, ok, type Result } from '@verity/shared/src/utils/result.js';
import type { LanguageModel } from '../llm/language-model.js';
import {
  ANALYSIS_UNAVAILABLE_MESSAGE,
  SEARCH_UNAVAILABLE_MESSAGE,
  analysisErrorMessage,
} from '../messages.js';

const log = createChildLogger('agent:verdict-synthesizer');

export interface VerdictSynthesizer {
  synthesize(claim: string, evidence: EvidenceBundle): Promise<string>;
}

export interface VerdictSynthesizerDeps {
  readonly languageModel: Capability<LanguageModel>;
  readonly languageRule: string;
}

export function formatEvidenceContext(evidence: EvidenceBundle): string {
  return evidence.entries
    .map(
      (entry, index) =>
        `Source [${String(index + 1)}]: ${entry.result.title}\nURL: ${entry.result.url}\nContent: ${entry.body}`,
    )
    .join('\n\n');
}

export function buildVerdictPrompt(
  claim: string,
  evidence: EvidenceBundle,
  languageRule: string,
): string {
  const sourceList = evidence.sourceUrls.map((url) => `- ${url}`).join('\n');

  return `You are a multilingual misinformation analyst.

USER CLAIM: "${claim}"

CONTEXT:
${formatEvidenceContext(evidence)}

INSTRUCTIONS:
1. Identify the language of the USER CLAIM. ${languageRule}
2. Analyze the context and decide how well it supports the claim.
3. Report the verdict on its own line in the format "Verdict: [${VERDICT_LABELS.join('|')}]".
4. Explain your reasoning briefly in the language of the claim, citing sources by their number.

SOURCES:
${sourceList}`;
}

/** Best-effort lookup of the verdict label in a model answer. */
export function findVerdictLabel(text: string): VerdictLabel | undefined {
  const match = /verdict:\s*\**\s*\[?\s*(factually true|factually false|misleading|unverified)/i.exec(
    text,
  );
  if (!match) {
    return undefined;
  }
  const found = match[1].toLowerCase();
  return VERDICT_LABELS.find((label) => label.toLowerCase() === found);
}

async function requestVerdict(model: LanguageModel, prompt: string): Promise<Result<string, LlmError>> {
  try {
    return ok(await model.generate(prompt));
  } catch (error) {
    if (error instanceof LlmError) {
      return err(error);
    }
    const cause = toError(error);
    return err(new LlmError(cause.message, cause));
  }
}

export function createVerdictSynthesizer(deps: VerdictSynthesizerDeps): VerdictSynthesizer {
  const { languageModel, languageRule } = deps;

  return {
    async synthesize(claim: string, evidence: EvidenceBundle): Promise<string> {
      if (evidence.entries.length === 0) {
        log.warn('No evidence retrieved, skipping analysis');
        return SEARCH_UNAVAILABLE_MESSAGE;
      }

      if (languageModel.status === 'unavailable') {
        log.warn({ reason: languageModel.reason }, 'Language model unavailable, skipping analysis');
        return ANALYSIS_UNAVAILABLE_MESSAGE;
      }

      const prompt = buildVerdictPrompt(claim, evidence, languageRule);
      log.info(
        { sources: evidence.entries.length, promptLength: prompt.length },
        'Synthesizing verdict',
      );

      const response = await requestVerdict(languageModel.client, prompt);
      if (!response.ok) {
        log.error({ error: response.error.message }, 'Verdict synthesis failed');
        return analysisErrorMessage(response.error);
      }

      log.info({ verdict: findVerdictLabel(response.value) }, 'Verdict synthesized');

      return response.value;
    },
  };
}
