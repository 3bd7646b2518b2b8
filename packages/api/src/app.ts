import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { VerificationPipeline } from '@verity/core/src/orchestration/pipeline.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, health } from './routes/health.js';
import { createChatbotRoutes } from './routes/chatbot.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly verifier: VerificationPipeline;
  readonly maxImageBytes: number;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    return c.json(
      app.getOpenAPI31Document({
        openapi: '3.1.0',
        info: {
          title: 'Verity API',
          version: API_VERSION,
          description: 'Checks news claims against web sources',
        },
      }),
    );
  });

  app.route(
    '/api/chatbot',
    createChatbotRoutes({ verifier: config.verifier, maxImageBytes: config.maxImageBytes }),
  );

  return app;
}
