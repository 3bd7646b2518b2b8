import { describe, it, expect } from 'vitest';
import { buildIntentPrompt } from '../agents/intent-classifier.js';
import { buildVerdictPrompt } from '../agents/verdict-synthesizer.js';
import { createMockLanguageModel } from './mock-language-model.js';

describe('createMockLanguageModel', () => {
  const model = createMockLanguageModel();

  it('should answer classification prompts with the claim label', async () => {
    await expect(model.generate(buildIntentPrompt('The sea is salty'))).resolves.toBe(
      'fact_checking_claim',
    );
  });

  it('should answer verdict prompts with an unverified verdict', async () => {
    const prompt = buildVerdictPrompt(
      'The sea is salty',
      {
        entries: [{ result: { title: 't', url: 'https://example.com', snippet: '' }, body: 'b' }],
        sourceUrls: ['https://example.com'],
      },
      'rule',
    );

    const answer = await model.generate(prompt);

    expect(answer.split('\n').slice(0, 2)).toEqual(['Language: English', 'Verdict: Unverified']);
  });

  it('should answer anything else with a generic text', async () => {
    await expect(model.generate('Say something')).resolves.toBe('Mock language model response');
  });
});
