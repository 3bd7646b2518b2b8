export interface OcrEngine {
  recognize(imageBytes: Buffer): Promise<string>;
}

export interface TextExtractor {
  /** Resolves to `null` when the image cannot be decoded or holds no readable text. */
  extractText(imageBytes: Buffer): Promise<string | null>;
}
