import sharp from 'sharp';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { IngestionError, ProviderError, toError } from '@verity/shared/src/utils/errors.js';
import { err, ok, type Result } from '@verity/shared/src/utils/result.js';
import type { OcrEngine, TextExtractor } from './types.js';

const log = createChildLogger('ingestion:image');

async function decodeImage(imageBytes: Buffer): Promise<Result<Buffer, IngestionError>> {
  if (imageBytes.length === 0) {
    return err(new IngestionError('Image payload is empty'));
  }

  try {
    // OCR input is always grayscale PNG.
    const normalized = await sharp(imageBytes).grayscale().png().toBuffer();
    return ok(normalized);
  } catch (error) {
    const cause = toError(error);
    return err(new IngestionError(`Image could not be decoded: ${cause.message}`, cause));
  }
}

async function recognizeText(
  ocrEngine: OcrEngine,
  image: Buffer,
): Promise<Result<string, ProviderError>> {
  try {
    return ok(await ocrEngine.recognize(image));
  } catch (error) {
    const cause = toError(error);
    return err(new ProviderError(`OCR failed: ${cause.message}`, 'ocr', cause));
  }
}

export function createTextExtractor(ocrEngine: OcrEngine): TextExtractor {
  return {
    async extractText(imageBytes: Buffer): Promise<string | null> {
      log.info({ bytes: imageBytes.length }, 'Extracting text from image');

      const decoded = await decodeImage(imageBytes);
      if (!decoded.ok) {
        log.warn({ error: decoded.error.message }, 'Image decoding failed');
        return null;
      }

      const recognized = await recognizeText(ocrEngine, decoded.value);
      if (!recognized.ok) {
        log.warn({ error: recognized.error.message }, 'Text recognition failed');
        return null;
      }

      const text = recognized.value.trim();
      if (text.length === 0) {
        log.info('No text found in image');
        return null;
      }

      log.info({ characters: text.length }, 'Text extracted from image');
      return text;
    },
  };
}
