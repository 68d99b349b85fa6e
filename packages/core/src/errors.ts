/**
 * Base error class for all http-exchange errors.
 *
 * Every failure raised by the library extends this class, whether it comes from
 * an exchange (transport, timeout, body read) or from the JSON codec helpers.
 *
 * @example
 * ```typescript
 * try {
 *   await client.get('https://api.example.com/items');
 * } catch (error) {
 *   if (error instanceof ExchangeError) {
 *     console.log(error.code);     // 'timeout', 'network_error', etc.
 *     console.log(error.toJSON()); // Consistent serialization
 *   }
 * }
 * ```
 */

import type { ExchangeErrorCode } from './types/errors.js';

export class ExchangeError extends Error {
  /**
   * Error code describing the type of error.
   * Typed as `string` at the base level to allow subclasses (e.g. HTTP errors)
   * to use their own error code unions.
   */
  readonly code: ExchangeErrorCode | (string & {});

  /**
   * The underlying error that caused this error, if any.
   */
  override readonly cause: unknown;

  constructor(message: string, code: ExchangeErrorCode | (string & {}) = 'exchange_error', cause?: unknown) {
    super(message);
    this.name = 'ExchangeError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Creates a human-readable string representation
   */
  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Converts to a plain object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Type guard to check if an error is any ExchangeError (base class).
 */
export function isExchangeError(error: unknown): error is ExchangeError {
  return error instanceof ExchangeError;
}
