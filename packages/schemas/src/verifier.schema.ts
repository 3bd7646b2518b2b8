import { z } from 'zod';

export const DEFAULT_GREETINGS = [
  'hello',
  'hi',
  'vanakkam',
  'hai',
  'good morning',
  'good evening',
] as const;

export const DEFAULT_LANGUAGE_RULE =
  'SPECIAL RULE: if the claim is written in the Roman alphabet, you MUST assume its language is ENGLISH.';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const SearchSettingsSchema = z.object({
  resultCount: z.number().int().min(1).max(10).default(3),
  timeoutMs: z.number().int().positive().default(10_000),
});

const FetchSettingsSchema = z.object({
  timeoutMs: z.number().int().positive().default(10_000),
  maxBodyChars: z.number().int().positive().default(2500),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

const LlmSettingsSchema = z.object({
  model: z.string().min(1).default('gemini-2.0-flash'),
  temperature: z.number().min(0).max(2).default(0.2),
  timeoutMs: z.number().int().positive().default(30_000),
});

const IntentSettingsSchema = z.object({
  greetings: z
    .array(z.string().trim().min(1).toLowerCase())
    .min(1)
    .default([...DEFAULT_GREETINGS]),
});

const SynthesisSettingsSchema = z.object({
  languageRule: z.string().default(DEFAULT_LANGUAGE_RULE),
});

const OcrSettingsSchema = z.object({
  language: z.string().min(1).default('eng'),
  timeoutMs: z.number().int().positive().default(30_000),
});

const ApiSettingsSchema = z.object({
  maxImageBytes: z
    .number()
    .int()
    .positive()
    .default(5 * 1024 * 1024),
});

export const VerifierSettingsSchema = z.object({
  $schema: z.string().optional(),
  search: SearchSettingsSchema.default({}),
  fetch: FetchSettingsSchema.default({}),
  llm: LlmSettingsSchema.default({}),
  intent: IntentSettingsSchema.default({}),
  synthesis: SynthesisSettingsSchema.default({}),
  ocr: OcrSettingsSchema.default({}),
  api: ApiSettingsSchema.default({}),
});

export type VerifierSettings = z.infer<typeof VerifierSettingsSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type FetchSettings = z.infer<typeof FetchSettingsSchema>;
export type LlmSettings = z.infer<typeof LlmSettingsSchema>;
