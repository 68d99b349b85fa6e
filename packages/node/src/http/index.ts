/**
 * Exchange client module.
 * @module
 */

// Types from client
export type {
  ExchangeClientOptions,
  ExchangeObservabilityHooks,
  ExchangeRequestMeta,
  ExchangeResponseMeta,
  RequestBody,
  RequestCallback,
} from './client.js';

// Error types (re-exported from public types)
export type { AnyExchangeErrorCode, HttpErrorCode, HttpErrorDetails } from './client.js';

// Implementation
export { ExchangeClient } from './fetch-adapter.js';

// Request callbacks
export { jsonRequestCallback } from './callbacks.js';

// Errors
export {
  createBodyReadError,
  createCallbackError,
  createHookError,
  createInvalidRequestError,
  createNetworkError,
  createTimeoutError,
  ExchangeError,
  ExchangeHttpError,
  isExchangeError,
  isExchangeHttpError,
  isTimeoutError,
} from './errors.js';
