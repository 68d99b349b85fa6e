/**
 * @http-exchange/core
 *
 * Runtime-agnostic internals shared by the exchange client packages.
 */

// Base error
export { ExchangeError, isExchangeError } from './errors.js';

// Header utilities
export { getHeader, normalizeHeaders, parseAllowHeader } from './headers.js';

// JSON codec
export { bodyText, decodeJSON, encodeJSON } from './codec.js';

// Types
export type {
  CodecErrorCode,
  ExchangeErrorCode,
  HeaderSource,
  HttpMethod,
  ResponseEntity,
  ResponseHeaders,
} from './types/index.js';
