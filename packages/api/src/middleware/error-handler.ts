import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ValidationError } from '@verity/shared/src/utils/errors.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ValidationError) {
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details: [err.message],
    };
    return c.json(body, 400);
  }

  // Malformed JSON bodies are rejected by the request validator with a 400.
  if (err instanceof HTTPException && err.status === 400) {
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details: [err.message],
    };
    return c.json(body, 400);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
