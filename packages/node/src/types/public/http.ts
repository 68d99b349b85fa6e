/**
 * Exchange client types
 *
 * These types describe the options, hooks and callbacks accepted by
 * {@link ExchangeClient}. Requests are undici `Request` objects, so a callback
 * can use the full fetch `Headers` API.
 */

import type { ResponseEntity } from '@http-exchange/core';
import type { Dispatcher, fetch, Request } from 'undici';

/**
 * Request body types
 */
export type RequestBody = string | Uint8Array | ArrayBuffer | ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>;

/**
 * Mutates an outbound request before it is sent.
 * Invoked exactly once per exchange, synchronously, before dispatch.
 */
export type RequestCallback = (request: Request) => void;

/**
 * Metadata provided to observability hooks
 */
export interface ExchangeRequestMeta {
  /** Exchange start timestamp (Date.now()) */
  startTime: number;
  url: string;
  method: string;
  /** Outgoing headers after the request callback ran */
  headers: Record<string, string>;
}

/**
 * Metadata provided to response/error hooks
 */
export interface ExchangeResponseMeta extends ExchangeRequestMeta {
  /** Exchange duration in milliseconds */
  durationMs: number;
  /** Response status code (if available) */
  status?: number;
}

/**
 * Observability hooks for monitoring exchanges
 */
export interface ExchangeObservabilityHooks {
  /**
   * Called before a request is dispatched
   */
  onRequest?: (meta: ExchangeRequestMeta) => void;
  /**
   * Called after a response body has been fully read
   */
  onResponse?: (entity: ResponseEntity, meta: ExchangeResponseMeta) => void;
  /**
   * Called once when an exchange fails, before the promise rejects
   */
  onError?: (error: Error, meta: ExchangeResponseMeta) => void;
}

/**
 * Configuration options for the exchange client
 */
export interface ExchangeClientOptions {
  /**
   * Upper bound on one whole exchange, from call start to the last body byte
   * @default 10000 (10 seconds)
   */
  request_timeout_ms?: number;
  /**
   * Upper bound on connection establishment and TLS handshake.
   * Ignored when `dispatcher` is provided.
   * @default 5000 (5 seconds)
   */
  connect_timeout_ms?: number;
  /**
   * Shared undici dispatcher. When omitted the client owns an `Agent`
   * and releases it on {@link ExchangeClient.close}.
   */
  dispatcher?: Dispatcher;
  /**
   * Observability hooks for monitoring exchanges
   */
  hooks?: ExchangeObservabilityHooks;
  /**
   * Custom fetch implementation
   * Defaults to undici's fetch
   */
  fetch?: typeof fetch;
}
