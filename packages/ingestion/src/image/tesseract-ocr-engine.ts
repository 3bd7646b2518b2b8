import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ConfigurationError, ProviderError, toError } from '@verity/shared/src/utils/errors.js';
import type { OcrEngine } from './types.js';

const log = createChildLogger('ingestion:tesseract');

export const BUNDLED_LANGUAGE = 'eng';

const BUNDLED_MODEL_DIR = '4.0.0_best_int';

export interface TesseractOcrConfig {
  readonly language: string;
  readonly timeoutMs: number;
  /** Directory holding `<language>.traineddata.gz`; defaults to the bundled English model. */
  readonly langPath?: string;
}

/** Traineddata shipped by the `@tesseract.js-data/eng` package. */
export function resolveBundledLangPath(): string {
  const require = createRequire(import.meta.url);
  const packageJson = require.resolve('@tesseract.js-data/eng/package.json');
  return join(dirname(packageJson), BUNDLED_MODEL_DIR);
}

function resolveLangPath(config: TesseractOcrConfig): string {
  if (config.langPath) {
    return config.langPath;
  }
  if (config.language !== BUNDLED_LANGUAGE) {
    throw new ConfigurationError(
      `OCR_LANG_PATH is required for OCR language "${config.language}"`,
    );
  }
  return resolveBundledLangPath();
}

export function createTesseractOcrEngine(config: TesseractOcrConfig): OcrEngine {
  const langPath = resolveLangPath(config);

  log.info(
    { language: config.language, bundled: !config.langPath, timeoutMs: config.timeoutMs },
    'Creating OCR engine',
  );

  return {
    async recognize(imageBytes: Buffer): Promise<string> {
      const tesseract = await import('tesseract.js');

      // Worker failures surface through errorHandler, not through the createWorker promise.
      return new Promise<string>((resolve, reject) => {
        let settled = false;
        const fail = (error: Error): void => {
          settled = true;
          reject(error);
        };

        const timer = setTimeout(() => {
          fail(new ProviderError(`OCR timed out after ${String(config.timeoutMs)}ms`, 'ocr'));
        }, config.timeoutMs);

        void tesseract.default
          .createWorker(config.language, undefined, {
            langPath,
            cacheMethod: 'none',
            errorHandler: (error: unknown) => {
              fail(new ProviderError(`OCR worker failed: ${toError(error).message}`, 'ocr'));
            },
          })
          .then(async (worker) => {
            try {
              if (settled) {
                return;
              }
              const { data } = await worker.recognize(imageBytes);
              log.debug({ characters: data.text.length }, 'OCR complete');
              settled = true;
              resolve(data.text);
            } finally {
              await worker.terminate();
            }
          })
          .catch((error: unknown) => {
            fail(toError(error));
          })
          .finally(() => {
            clearTimeout(timer);
          });
      });
    },
  };
}
