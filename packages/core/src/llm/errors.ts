// Custom error types for LLM components

/**
 * Base error for all LLM-related errors
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LLMError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when component configuration cannot yield a usable request,
 * e.g. no API key at any option layer or an unknown provider name
 */
export class ConfigurationError extends LLMError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown on first real use when the vendor client library is absent
 */
export class DependencyMissingError extends LLMError {
  constructor(
    message: string,
    public readonly dependency: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'DependencyMissingError';
  }
}

/**
 * Thrown when merged options fail validation
 */
export class LLMValidationError extends LLMError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'LLMValidationError';
  }
}

/**
 * Check if an error is an LLMError or subclass
 */
export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}
