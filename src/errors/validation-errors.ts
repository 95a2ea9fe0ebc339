import { ValidationError } from './index';

// Provider returned a response that does not have the expected shape
export class APIResponseError extends ValidationError {
  constructor(message: string, public readonly response: unknown, public readonly originalError?: unknown) {
    super(`API Response Error: ${message}`);
    this.name = 'APIResponseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, APIResponseError);
    }
  }
}

/**
 * Type guard to check if an error came from a malformed provider response
 */
export function isAPIResponseError(error: unknown): error is APIResponseError {
  return error instanceof APIResponseError;
}
