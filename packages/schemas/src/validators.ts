import type { ZodError } from 'zod';
import { SchemaValidationError } from '@verity/shared/src/utils/errors.js';
import { VerifierSettingsSchema } from './verifier.schema.js';
import type { VerifierSettings } from './verifier.schema.js';
import { EnvironmentSchema } from './environment.schema.js';
import type { Environment } from './environment.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateVerifierSettings(data: unknown): VerifierSettings {
  const result = VerifierSettingsSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid verifier settings', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateEnvironment(env: Record<string, string | undefined>): Environment {
  const result = EnvironmentSchema.safeParse(env);

  if (!result.success) {
    throw new SchemaValidationError('Invalid environment', formatZodErrors(result.error));
  }

  return result.data;
}
