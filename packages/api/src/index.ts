import { serve } from '@hono/node-server';
import { loadConfig } from '@verity/schemas/src/config-loader.js';
import { createVerifier } from '@verity/core/src/verifier.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { SchemaValidationError, toError } from '@verity/shared/src/utils/errors.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const config = await loadConfig();
  const verifier = createVerifier(config);

  const app = createApp({
    verifier,
    maxImageBytes: config.settings.api.maxImageBytes,
  });

  log.info({ port: config.port }, 'Starting Verity API server');

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'Verity API server running');
  });
}

main().catch((error: unknown) => {
  const details = error instanceof SchemaValidationError ? error.validationErrors : undefined;
  log.error({ error: toError(error).message, details }, 'Failed to start API server');
  process.exit(1);
});
