/**
 * Unified error types for http-exchange
 *
 * All errors extend ExchangeError, so one `instanceof` check covers
 * exchange failures and codec failures alike.
 */

// Re-export shared error types from @http-exchange/core
import type { CodecErrorCode } from '@http-exchange/core';
export type { CodecErrorCode } from '@http-exchange/core';

/**
 * Error codes for exchange failures
 */
export type HttpErrorCode = 'invalid_request' | 'callback_error' | 'hook_error' | 'network_error' | 'timeout' | 'body_read_error';

/**
 * All possible error codes (core codec codes + exchange-specific codes)
 */
export type AnyExchangeErrorCode = CodecErrorCode | 'invalid_options' | 'exchange_error' | HttpErrorCode;

/**
 * Error details for ExchangeHttpError
 */
export interface HttpErrorDetails {
  code: HttpErrorCode;
  message: string;
  url: string;
  /** Method as passed by the caller, which may not be a valid token */
  method: string;
  cause?: unknown;
}
