/**
 * Exchange error handling
 */

import { ExchangeError } from '@http-exchange/core';
import type { ResponseHeaders } from '@http-exchange/core';

import type { HttpErrorCode, HttpErrorDetails } from '../types/public/errors.js';

// Re-export ExchangeError for consumers that import from this module
export { ExchangeError, isExchangeError } from '@http-exchange/core';

/**
 * Error class for every failed exchange.
 *
 * Raised when a request cannot be built, when the request callback throws,
 * when the transport fails or the deadline fires, and when the response body
 * cannot be read. HTTP status codes are never errors at this layer.
 */
export class ExchangeHttpError extends ExchangeError {
  /** Categorized exchange error code */
  declare readonly code: HttpErrorCode;
  /** Request URL */
  readonly url: string;
  /** HTTP method */
  readonly method: string;
  /** Response headers; always empty, no partial response escapes a failed exchange */
  readonly headers: ResponseHeaders;

  constructor(details: HttpErrorDetails) {
    super(details.message, details.code, details.cause);
    this.name = 'ExchangeHttpError';
    this.url = details.url;
    this.method = details.method;
    this.headers = {};
  }

  /**
   * Creates a human-readable string representation
   */
  override toString(): string {
    const parts = [`ExchangeHttpError [${this.code}]: ${this.message}`];
    parts.push(`  Method: ${this.method}`);
    parts.push(`  URL: ${this.url}`);
    return parts.join('\n');
  }

  /**
   * Converts to a plain object for logging/serialization
   */
  override toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      url: this.url,
      method: this.method,
    };
  }
}

function causeMessage(cause: unknown, fallback: string): string {
  return cause instanceof Error ? cause.message : fallback;
}

/**
 * Creates a request construction error (bad URL, method or body)
 */
export function createInvalidRequestError(url: string, method: string, cause: unknown): ExchangeHttpError {
  return new ExchangeHttpError({
    code: 'invalid_request',
    message: `Invalid request: ${causeMessage(cause, 'Request could not be constructed')}`,
    url,
    method,
    cause,
  });
}

/**
 * Creates an error for a request callback that threw
 */
export function createCallbackError(url: string, method: string, cause: unknown): ExchangeHttpError {
  return new ExchangeHttpError({
    code: 'callback_error',
    message: `Request callback failed: ${causeMessage(cause, 'Request callback threw')}`,
    url,
    method,
    cause,
  });
}

/**
 * Creates an error for an observability hook that threw
 */
export function createHookError(url: string, method: string, cause: unknown): ExchangeHttpError {
  return new ExchangeHttpError({
    code: 'hook_error',
    message: `Hook failed: ${causeMessage(cause, 'Observability hook threw')}`,
    url,
    method,
    cause,
  });
}

/**
 * Creates a network error
 */
export function createNetworkError(url: string, method: string, cause: unknown): ExchangeHttpError {
  return new ExchangeHttpError({
    code: 'network_error',
    message: `Network error: ${causeMessage(cause, 'Network request failed')}`,
    url,
    method,
    cause,
  });
}

/**
 * Creates a timeout error
 */
export function createTimeoutError(url: string, method: string, timeoutMs: number, cause?: unknown): ExchangeHttpError {
  return new ExchangeHttpError({
    code: 'timeout',
    message: `Request timed out after ${timeoutMs}ms`,
    url,
    method,
    cause,
  });
}

/**
 * Creates a body read error
 */
export function createBodyReadError(url: string, method: string, cause: unknown): ExchangeHttpError {
  return new ExchangeHttpError({
    code: 'body_read_error',
    message: `Body read error: ${causeMessage(cause, 'Failed to read response body')}`,
    url,
    method,
    cause,
  });
}

/**
 * Type guard to check if an error is an ExchangeHttpError
 */
export function isExchangeHttpError(error: unknown): error is ExchangeHttpError {
  return error instanceof ExchangeHttpError;
}

/**
 * Checks if an error is an exchange that ran past its deadline
 */
export function isTimeoutError(error: unknown): boolean {
  return isExchangeHttpError(error) && error.code === 'timeout';
}
