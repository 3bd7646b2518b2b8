import { describe, it, expect, vi } from 'vitest';
import type { VerificationPipeline } from '@verity/core/src/orchestration/pipeline.js';
import { createApp } from './app.js';

function createVerifier(): VerificationPipeline {
  return { handle: vi.fn().mockResolvedValue('ok') };
}

describe('createApp', () => {
  it('should report health', async () => {
    const app = createApp({ verifier: createVerifier(), maxImageBytes: 1024 });

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '0.1.0' });
  });

  it('should set a request id on every response', async () => {
    const app = createApp({ verifier: createVerifier(), maxImageBytes: 1024 });

    const res = await app.request('/health');

    expect(res.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should echo a request id sent by the caller', async () => {
    const app = createApp({ verifier: createVerifier(), maxImageBytes: 1024 });

    const res = await app.request('/health', { headers: { 'X-Request-Id': 'req-123' } });

    expect(res.headers.get('X-Request-Id')).toBe('req-123');
  });

  it('should publish the OpenAPI document', async () => {
    const app = createApp({ verifier: createVerifier(), maxImageBytes: 1024 });

    const res = await app.request('/openapi.json');
    const document: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(document).toMatchObject({
      openapi: '3.1.0',
      info: { title: 'Verity API', version: '0.1.0' },
    });
  });
});
