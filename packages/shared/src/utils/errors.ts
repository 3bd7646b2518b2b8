export class VerityError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VerityError';
  }
}

export class IngestionError extends VerityError {
  constructor(message: string, cause?: Error) {
    super(message, 'INGESTION_ERROR', cause);
    this.name = 'IngestionError';
  }
}

export type ProviderKind = 'search' | 'fetch' | 'llm' | 'ocr';

export class ProviderError extends VerityError {
  constructor(
    message: string,
    public readonly provider: ProviderKind,
    cause?: Error,
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }
}

export class LlmError extends ProviderError {
  constructor(message: string, cause?: Error) {
    super(message, 'llm', cause);
    this.name = 'LlmError';
  }
}

export class SchemaValidationError extends VerityError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends VerityError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends VerityError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
