import { describe, it, expect } from 'vitest';
import { validateEnvironment, validateVerifierSettings } from './validators.js';
import { DEFAULT_GREETINGS, DEFAULT_LANGUAGE_RULE } from './verifier.schema.js';
import { SchemaValidationError } from '@verity/shared/src/utils/errors.js';

describe('validateVerifierSettings', () => {
  it('should fill every default for an empty object', () => {
    const settings = validateVerifierSettings({});

    expect(settings.search).toEqual({ resultCount: 3, timeoutMs: 10_000 });
    expect(settings.fetch.timeoutMs).toBe(10_000);
    expect(settings.fetch.maxBodyChars).toBe(2500);
    expect(settings.fetch.userAgent).toContain('Mozilla/5.0');
    expect(settings.llm).toEqual({ model: 'gemini-2.0-flash', temperature: 0.2, timeoutMs: 30_000 });
    expect(settings.intent.greetings).toEqual([...DEFAULT_GREETINGS]);
    expect(settings.synthesis.languageRule).toBe(DEFAULT_LANGUAGE_RULE);
    expect(settings.ocr).toEqual({ language: 'eng', timeoutMs: 30_000 });
    expect(settings.api.maxImageBytes).toBe(5 * 1024 * 1024);
  });

  it('should keep overrides and default the rest of a section', () => {
    const settings = validateVerifierSettings({ search: { resultCount: 5 } });

    expect(settings.search).toEqual({ resultCount: 5, timeoutMs: 10_000 });
  });

  it('should normalize greeting literals to trimmed lower case', () => {
    const settings = validateVerifierSettings({ intent: { greetings: ['  Hey There ', 'YO'] } });

    expect(settings.intent.greetings).toEqual(['hey there', 'yo']);
  });

  it('should reject a result count above the provider maximum', () => {
    expect(() => validateVerifierSettings({ search: { resultCount: 11 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject an empty greeting list', () => {
    expect(() => validateVerifierSettings({ intent: { greetings: [] } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should report the failing path in validation errors', () => {
    let caught: unknown;
    try {
      validateVerifierSettings({ fetch: { timeoutMs: -1 } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaValidationError);
    if (caught instanceof SchemaValidationError) {
      expect(caught.validationErrors[0]).toMatch(/^fetch\.timeoutMs: /);
    }
  });
});

describe('validateEnvironment', () => {
  it('should treat blank credentials as absent', () => {
    const env = validateEnvironment({ GOOGLE_API_KEY: '  ', GEMINI_API_KEY: '' });

    expect(env.GOOGLE_API_KEY).toBeUndefined();
    expect(env.GEMINI_API_KEY).toBeUndefined();
  });

  it('should trim configured credentials', () => {
    const env = validateEnvironment({ GEMINI_API_KEY: ' test-secret ' });

    expect(env.GEMINI_API_KEY).toBe('test-secret');
  });

  it('should default port and mock flag', () => {
    const env = validateEnvironment({});

    expect(env.PORT).toBe(3000);
    expect(env.VERITY_MOCK_PROVIDERS).toBe(false);
  });

  it('should parse the mock flag and port', () => {
    const env = validateEnvironment({ VERITY_MOCK_PROVIDERS: 'true', PORT: '8080' });

    expect(env.VERITY_MOCK_PROVIDERS).toBe(true);
    expect(env.PORT).toBe(8080);
  });

  it('should reject an invalid mock flag', () => {
    expect(() => validateEnvironment({ VERITY_MOCK_PROVIDERS: 'yes' })).toThrow(
      SchemaValidationError,
    );
  });
});
