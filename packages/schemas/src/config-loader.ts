import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ConfigurationError, toError } from '@verity/shared/src/utils/errors.js';
import { validateEnvironment, validateVerifierSettings } from './validators.js';
import type { VerifierSettings } from './verifier.schema.js';

const log = createChildLogger('schemas:config-loader');

export const DEFAULT_SETTINGS_PATH = 'config/verifier.json';

export interface Credentials {
  readonly googleApiKey?: string;
  readonly searchEngineId?: string;
  readonly geminiApiKey?: string;
}

export interface VerifierConfig {
  readonly settings: VerifierSettings;
  readonly credentials: Credentials;
  readonly mockProviders: boolean;
  readonly port: number;
  readonly ocrLangPath?: string;
}

export interface LoadConfigOptions {
  readonly env?: Record<string, string | undefined>;
  readonly settingsPath?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readSettingsFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.info({ filePath }, 'Settings file not found, using defaults');
      return {};
    }
    throw new ConfigurationError(
      `Failed to read settings file ${filePath}: ${toError(error).message}`,
    );
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${toError(error).message}`);
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<VerifierConfig> {
  const env = validateEnvironment(options.env ?? process.env);
  const settingsPath = resolve(
    options.settingsPath ?? env.VERITY_CONFIG_PATH ?? DEFAULT_SETTINGS_PATH,
  );

  const settings = validateVerifierSettings(await readSettingsFile(settingsPath));

  const config: VerifierConfig = {
    settings,
    credentials: {
      googleApiKey: env.GOOGLE_API_KEY,
      searchEngineId: env.SEARCH_ENGINE_ID,
      geminiApiKey: env.GEMINI_API_KEY,
    },
    mockProviders: env.VERITY_MOCK_PROVIDERS,
    port: env.PORT,
    ocrLangPath: env.OCR_LANG_PATH,
  };

  log.info(
    {
      settingsPath,
      resultCount: settings.search.resultCount,
      searchConfigured: Boolean(env.GOOGLE_API_KEY && env.SEARCH_ENGINE_ID),
      llmConfigured: Boolean(env.GEMINI_API_KEY),
      mockProviders: config.mockProviders,
    },
    'Configuration loaded',
  );

  return config;
}
