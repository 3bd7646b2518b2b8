import { z } from '@hono/zod-openapi';
import { VERDICT_LABELS } from '@verity/shared/src/types/verification.types.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

export const ChatResponseSchema = z
  .object({
    text: z.string(),
    verdict: z.enum(VERDICT_LABELS).optional(),
  })
  .openapi('ChatResponse');

export type ChatResponse = z.infer<typeof ChatResponseSchema>;
