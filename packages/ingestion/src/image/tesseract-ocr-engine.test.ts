import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigurationError, ProviderError } from '@verity/shared/src/utils/errors.js';

const mocks = vi.hoisted(() => ({
  createWorker: vi.fn(),
  recognize: vi.fn(),
  terminate: vi.fn(),
}));

vi.mock('tesseract.js', () => ({
  default: { createWorker: mocks.createWorker },
}));

import { createTesseractOcrEngine, resolveBundledLangPath } from './tesseract-ocr-engine.js';

interface WorkerOptions {
  readonly langPath: string;
  readonly cacheMethod: string;
  readonly errorHandler: (error: unknown) => void;
}

const image = Buffer.from('png bytes');

describe('createTesseractOcrEngine', () => {
  beforeEach(() => {
    mocks.createWorker.mockReset();
    mocks.recognize.mockReset();
    mocks.terminate.mockReset();
    mocks.terminate.mockResolvedValue(undefined);
    mocks.recognize.mockResolvedValue({ data: { text: 'Recognized claim' } });
    mocks.createWorker.mockResolvedValue({
      recognize: mocks.recognize,
      terminate: mocks.terminate,
    });
  });

  it('should read with the bundled English model and no cache', async () => {
    const engine = createTesseractOcrEngine({ language: 'eng', timeoutMs: 1000 });

    await expect(engine.recognize(image)).resolves.toBe('Recognized claim');

    const [language, , options] = mocks.createWorker.mock.calls[0] as [
      string,
      undefined,
      WorkerOptions,
    ];
    expect(language).toBe('eng');
    expect(options.langPath).toBe(resolveBundledLangPath());
    expect(options.langPath.endsWith('4.0.0_best_int')).toBe(true);
    expect(options.cacheMethod).toBe('none');
    expect(mocks.recognize).toHaveBeenCalledWith(image);
    expect(mocks.terminate).toHaveBeenCalledTimes(1);
  });

  it('should use a configured language data directory', async () => {
    const engine = createTesseractOcrEngine({
      language: 'tam',
      timeoutMs: 1000,
      langPath: '/opt/tessdata',
    });

    await engine.recognize(image);

    const [language, , options] = mocks.createWorker.mock.calls[0] as [
      string,
      undefined,
      WorkerOptions,
    ];
    expect(language).toBe('tam');
    expect(options.langPath).toBe('/opt/tessdata');
  });

  it('should require a data directory for languages that are not bundled', () => {
    expect(() => createTesseractOcrEngine({ language: 'tam', timeoutMs: 1000 })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject when the worker reports an error', async () => {
    mocks.createWorker.mockImplementation(
      (_language: string, _oem: undefined, options: WorkerOptions) => {
        options.errorHandler(new Error('traineddata not found'));
        return new Promise(() => undefined);
      },
    );
    const engine = createTesseractOcrEngine({ language: 'eng', timeoutMs: 1000 });

    const result = engine.recognize(image);

    await expect(result).rejects.toThrow(ProviderError);
    await expect(result).rejects.toThrow('OCR worker failed: traineddata not found');
  });

  it('should reject when the worker never becomes ready', async () => {
    mocks.createWorker.mockReturnValue(new Promise(() => undefined));
    const engine = createTesseractOcrEngine({ language: 'eng', timeoutMs: 20 });

    await expect(engine.recognize(image)).rejects.toThrow('OCR timed out after 20ms');
  });

  it('should terminate the worker when recognition fails', async () => {
    mocks.recognize.mockRejectedValue(new Error('bad image'));
    const engine = createTesseractOcrEngine({ language: 'eng', timeoutMs: 1000 });

    await expect(engine.recognize(image)).rejects.toThrow('bad image');
    expect(mocks.terminate).toHaveBeenCalledTimes(1);
  });
});
