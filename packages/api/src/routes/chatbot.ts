import { createRoute } from '@hono/zod-openapi';
import { bodyLimit } from 'hono/body-limit';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { findVerdictLabel } from '@verity/core/src/agents/verdict-synthesizer.js';
import type { VerificationPipeline } from '@verity/core/src/orchestration/pipeline.js';
import { ValidationError } from '@verity/shared/src/utils/errors.js';
import { createRouter, type AppEnv } from '../types.js';
import { ChatRequestSchema } from '../schemas/requests.js';
import {
  ChatResponseSchema,
  ErrorResponseSchema,
  type ChatResponse,
} from '../schemas/responses.js';

export interface ChatbotRouteDeps {
  readonly verifier: VerificationPipeline;
  readonly maxImageBytes: number;
}

const chatRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Chatbot'],
  summary: 'Verify a text claim',
  request: {
    body: {
      content: { 'application/json': { schema: ChatRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: {
      description: 'Verification answer',
      content: { 'application/json': { schema: ChatResponseSchema } },
    },
    400: {
      description: 'Malformed request',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

function toChatResponse(text: string): ChatResponse {
  const verdict = findVerdictLabel(text);
  return verdict ? { text, verdict } : { text };
}

export function createChatbotRoutes(deps: ChatbotRouteDeps): OpenAPIHono<AppEnv> {
  const chatbot = createRouter();

  chatbot.openapi(chatRoute, async (c) => {
    const { message } = c.req.valid('json');
    const text = await deps.verifier.handle(message);
    return c.json(toChatResponse(text), 200);
  });

  chatbot.post(
    '/image',
    bodyLimit({
      maxSize: deps.maxImageBytes,
      onError: (c) =>
        c.json(
          {
            error: 'Payload too large',
            code: 'PAYLOAD_TOO_LARGE',
            requestId: c.get('requestId'),
          },
          413,
        ),
    }),
    async (c) => {
      const body = await c.req.parseBody();
      const file = body['file'];
      if (file === undefined || typeof file === 'string') {
        throw new ValidationError('file: an image file is required');
      }

      const imageBytes = Buffer.from(await file.arrayBuffer());
      if (imageBytes.length === 0) {
        throw new ValidationError('file: the image is empty');
      }

      const text = await deps.verifier.handle(undefined, imageBytes);
      return c.json(toChatResponse(text), 200);
    },
  );

  return chatbot;
}
