// Error types
export type { CodecErrorCode, AnyExchangeErrorCode, HttpErrorCode, HttpErrorDetails } from './errors.js';

// Exchange types
export type {
  ExchangeClientOptions,
  ExchangeObservabilityHooks,
  ExchangeRequestMeta,
  ExchangeResponseMeta,
  RequestBody,
  RequestCallback,
} from './http.js';

// Core value types
export type { HttpMethod, ResponseEntity, ResponseHeaders } from '@http-exchange/core';
