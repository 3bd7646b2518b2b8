import { z } from 'zod';

// Blank values in a .env file mean "not configured".
const optionalValue = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
);

export const EnvironmentSchema = z.object({
  GOOGLE_API_KEY: optionalValue,
  SEARCH_ENGINE_ID: optionalValue,
  GEMINI_API_KEY: optionalValue,
  OCR_LANG_PATH: optionalValue,
  VERITY_CONFIG_PATH: optionalValue,
  VERITY_MOCK_PROVIDERS: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
