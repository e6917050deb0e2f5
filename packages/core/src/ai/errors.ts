/**
 * Model Client Error Types
 *
 * Errors raised while sending structured turns to the chat endpoint.
 * Each carries a code and a recoverable flag for the caller's fallback logic.
 */

export class ModelClientError extends Error {
  readonly code: string;
  readonly recoverable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      code: string;
      recoverable: boolean;
      statusCode?: number;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'ModelClientError';
    this.code = options.code;
    this.recoverable = options.recoverable;
    this.statusCode = options.statusCode;
  }
}

export class RateLimitError extends ModelClientError {
  constructor(cause?: Error) {
    super('Rate limited by the chat endpoint', {
      code: 'RATE_LIMIT',
      recoverable: true,
      statusCode: 429,
      cause,
    });
    this.name = 'RateLimitError';
  }
}

export class ModelUnavailableError extends ModelClientError {
  constructor(statusCode?: number, cause?: Error) {
    super('Chat endpoint is unavailable', {
      code: 'MODEL_UNAVAILABLE',
      recoverable: true,
      statusCode,
      cause,
    });
    this.name = 'ModelUnavailableError';
  }
}

export class InvalidResponseError extends ModelClientError {
  constructor(detail: string, statusCode?: number, cause?: Error) {
    super(`Invalid response from the chat endpoint: ${detail}`, {
      code: 'INVALID_RESPONSE',
      recoverable: false,
      statusCode,
      cause,
    });
    this.name = 'InvalidResponseError';
  }
}
