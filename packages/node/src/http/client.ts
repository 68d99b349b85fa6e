/**
 * Exchange client types.
 *
 * @module
 *
 * @example Monitoring exchanges through hooks
 * ```typescript
 * import { ExchangeClient } from '@http-exchange/node';
 *
 * const client = new ExchangeClient({
 *   request_timeout_ms: 5000,
 *   hooks: {
 *     onRequest: (meta) => console.log(`${meta.method} ${meta.url}`),
 *     onResponse: (entity, meta) => console.log(`${meta.status} in ${meta.durationMs}ms`),
 *     onError: (err, meta) => console.error(`${meta.method} ${meta.url} failed:`, err.message),
 *   },
 * });
 * ```
 *
 * @example Sharing a connection pool between clients
 * ```typescript
 * import { Agent } from 'undici';
 *
 * const agent = new Agent({ connect: { timeout: 2000 } });
 * const fast = new ExchangeClient({ dispatcher: agent, request_timeout_ms: 1000 });
 * const slow = new ExchangeClient({ dispatcher: agent, request_timeout_ms: 60000 });
 * ```
 */

export type {
  ExchangeClientOptions,
  AnyExchangeErrorCode,
  ExchangeObservabilityHooks,
  ExchangeRequestMeta,
  ExchangeResponseMeta,
  HttpErrorCode,
  HttpErrorDetails,
  RequestBody,
  RequestCallback,
} from '../types/public/index.js';
