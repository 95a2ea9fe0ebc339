// Base error class for all faqforge errors
export class FaqforgeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FaqforgeError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends FaqforgeError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for invalid pipeline parameters. Fatal: raised before any work starts.
export class ConfigError extends FaqforgeError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Network, auth or model failure while generating candidates for one chunk
export class GenerationError extends FaqforgeError {
  constructor(
    message: string,
    public readonly chunkIndex?: number,
    public readonly originalError?: unknown
  ) {
    super(message, 'GENERATION_ERROR');
    this.name = 'GenerationError';
  }
}

// Model response for one chunk was not in question/answer form
export class ParseError extends FaqforgeError {
  constructor(
    message: string,
    public readonly chunkIndex?: number,
    public readonly preview?: string
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

// Zero chunks were produced. Reported as a terminal run state, never thrown by the pipeline.
export class EmptyDocumentError extends FaqforgeError {
  constructor(public readonly source: string) {
    super(`Document ${source} produced no chunks`, 'EMPTY_DOCUMENT');
    this.name = 'EmptyDocumentError';
  }
}

// Run was aborted or timed out while a chunk was in flight
export class CancellationError extends FaqforgeError {
  constructor(message: string) {
    super(message, 'CANCELLED');
    this.name = 'CancellationError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
