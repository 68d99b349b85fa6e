/**
 * Exchange client built on undici's fetch.
 *
 * @module
 */

import { getHeader, normalizeHeaders, parseAllowHeader } from '@http-exchange/core';
import type { HttpMethod, ResponseEntity, ResponseHeaders } from '@http-exchange/core';
import { Agent, fetch as undiciFetch, Request } from 'undici';
import type { Dispatcher, Response } from 'undici';

import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS } from '../constants.js';
import type {
  ExchangeClientOptions,
  ExchangeObservabilityHooks,
  ExchangeRequestMeta,
  ExchangeResponseMeta,
  RequestBody,
  RequestCallback,
} from '../types/public/http.js';
import { jsonRequestCallback } from './callbacks.js';
import {
  createBodyReadError,
  createCallbackError,
  createHookError,
  createInvalidRequestError,
  createNetworkError,
  createTimeoutError,
  ExchangeError,
  ExchangeHttpError,
} from './errors.js';

function resolveTimeout(name: string, value: number | undefined, fallback: number): number {
  const timeoutMs = value ?? fallback;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ExchangeError(`${name} must be a positive number of milliseconds, got ${timeoutMs}`, 'invalid_options');
  }
  return timeoutMs;
}

/**
 * Builds the outbound request. Any failure here happens before network activity.
 */
function buildRequest(url: string, method: string, body: RequestBody | null | undefined, signal: AbortSignal): Request {
  try {
    return new Request(url, {
      method,
      signal,
      ...(body !== null && body !== undefined && { body, duplex: 'half' as const }),
    });
  } catch (error) {
    throw createInvalidRequestError(url, method, error);
  }
}

/**
 * HTTP exchange client.
 *
 * Every verb is a projection over {@link ExchangeClient.exchange}, which builds
 * the request, bounds it with a per-call deadline, runs the request callback,
 * dispatches it and buffers the response into a {@link ResponseEntity}.
 * Any HTTP status resolves; only construction, callback, hook, transport,
 * timeout and body-read failures reject.
 *
 * @example Basic usage
 * ```typescript
 * const client = new ExchangeClient({ request_timeout_ms: 2000 });
 *
 * const entity = await client.get('https://api.example.com/items');
 * const items = decodeJSON<Item[]>(entity.body);
 *
 * await client.close();
 * ```
 *
 * @example Adding auth through a request callback
 * ```typescript
 * const entity = await client.exchange('https://api.example.com/me', 'GET', null, (request) => {
 *   jsonRequestCallback(request);
 *   request.headers.set('Authorization', 'Bearer token');
 * });
 * ```
 *
 * @example With custom fetch (e.g., for testing)
 * ```typescript
 * const mockFetch = jest.fn().mockResolvedValue(new Response('{}'));
 * const client = new ExchangeClient({ fetch: mockFetch });
 * ```
 */
export class ExchangeClient {
  readonly requestTimeoutMs: number;
  readonly connectTimeoutMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly hooks: ExchangeObservabilityHooks;
  private readonly fetchImpl: typeof undiciFetch;

  constructor(options: ExchangeClientOptions = {}) {
    this.requestTimeoutMs = resolveTimeout('request_timeout_ms', options.request_timeout_ms, DEFAULT_REQUEST_TIMEOUT_MS);
    this.connectTimeoutMs = resolveTimeout('connect_timeout_ms', options.connect_timeout_ms, DEFAULT_CONNECT_TIMEOUT_MS);
    this.hooks = options.hooks ?? {};
    this.fetchImpl = options.fetch ?? undiciFetch;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      // connect.timeout bounds both the TCP connect and the TLS handshake
      this.dispatcher = new Agent({ connect: { timeout: this.connectTimeoutMs } });
      this.ownsDispatcher = true;
    }
  }

  /**
   * Performs one exchange.
   *
   * @param url - Absolute URL; parsed by the request constructor, not pre-validated
   * @param method - HTTP method token
   * @param body - Optional request body
   * @param callback - Optional mutator, invoked once before dispatch
   * @throws {ExchangeHttpError}
   */
  async exchange(
    url: string,
    method: HttpMethod | (string & {}),
    body?: RequestBody | null,
    callback?: RequestCallback | null
  ): Promise<ResponseEntity> {
    const startTime = Date.now();
    let requestMeta: ExchangeRequestMeta = { startTime, url, method, headers: {} };

    // Deadline scoped to this call only
    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => {
      timeoutController.abort(new Error('Request timeout'));
    }, this.requestTimeoutMs);

    try {
      const request = buildRequest(url, method, body, timeoutController.signal);

      if (callback) {
        try {
          callback(request);
        } catch (error) {
          throw createCallbackError(url, method, error);
        }
      }

      requestMeta = { ...requestMeta, headers: Object.fromEntries(request.headers.entries()) };
      try {
        this.hooks.onRequest?.(requestMeta);
      } catch (error) {
        throw createHookError(url, method, error);
      }

      let response: Response;
      try {
        response = await this.fetchImpl(request, { dispatcher: this.dispatcher });
      } catch (error) {
        throw this.normalizeError(error, url, method, timeoutController, createNetworkError);
      }

      // Drain fully; on failure the partial body is dropped
      let responseBody: Uint8Array;
      try {
        responseBody = new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw this.normalizeError(error, url, method, timeoutController, createBodyReadError);
      }

      const entity: ResponseEntity = {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: responseBody,
      };

      const responseMeta: ExchangeResponseMeta = {
        ...requestMeta,
        durationMs: Date.now() - startTime,
        status: response.status,
      };
      try {
        this.hooks.onResponse?.(entity, responseMeta);
      } catch (error) {
        throw createHookError(url, method, error);
      }

      return entity;
    } catch (error) {
      const normalizedError = this.normalizeError(error, url, method, timeoutController, createNetworkError);

      const errorMeta: ExchangeResponseMeta = {
        ...requestMeta,
        durationMs: Date.now() - startTime,
      };
      this.hooks.onError?.(normalizedError, errorMeta);

      throw normalizedError;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Gets the content at the given URL
   */
  get(url: string, callback: RequestCallback | null = jsonRequestCallback): Promise<ResponseEntity> {
    return this.exchange(url, 'GET', null, callback);
  }

  /**
   * Returns only the headers for the given URL
   */
  async head(url: string, callback: RequestCallback | null = jsonRequestCallback): Promise<ResponseHeaders> {
    const entity = await this.exchange(url, 'HEAD', null, callback);
    return entity.headers;
  }

  /**
   * Posts the body to the given URL
   */
  post(
    url: string,
    body?: RequestBody | null,
    callback: RequestCallback | null = jsonRequestCallback
  ): Promise<ResponseEntity> {
    return this.exchange(url, 'POST', body, callback);
  }

  /**
   * Puts the body to the given URL
   */
  put(
    url: string,
    body?: RequestBody | null,
    callback: RequestCallback | null = jsonRequestCallback
  ): Promise<ResponseEntity> {
    return this.exchange(url, 'PUT', body, callback);
  }

  /**
   * Patches the given URL with the body
   */
  patch(
    url: string,
    body?: RequestBody | null,
    callback: RequestCallback | null = jsonRequestCallback
  ): Promise<ResponseEntity> {
    return this.exchange(url, 'PATCH', body, callback);
  }

  /**
   * Deletes the resource at the given URL.
   * Resolves for any HTTP status; rejects only when the exchange itself fails.
   */
  async delete(url: string, callback: RequestCallback | null = jsonRequestCallback): Promise<void> {
    await this.exchange(url, 'DELETE', null, callback);
  }

  /**
   * Returns the methods listed in the `Allow` header of an OPTIONS response.
   * Tokens are not trimmed: `"POST, GET"` yields `["POST", " GET"]`.
   */
  async optionsForAllow(url: string, callback: RequestCallback | null = jsonRequestCallback): Promise<string[]> {
    const entity = await this.exchange(url, 'OPTIONS', null, callback);
    return parseAllowHeader(getHeader(entity.headers, 'allow'));
  }

  /**
   * Releases pooled connections. A dispatcher passed in options is left open.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  /**
   * Normalizes various error types into ExchangeHttpError.
   */
  private normalizeError(
    error: unknown,
    url: string,
    method: string,
    timeoutController: AbortController,
    fallback: (url: string, method: string, cause: unknown) => ExchangeHttpError
  ): ExchangeHttpError {
    // Already normalized by an inner phase
    if (error instanceof ExchangeHttpError) {
      return error;
    }

    // The only abort source is this call's deadline
    if (timeoutController.signal.aborted) {
      return createTimeoutError(url, method, this.requestTimeoutMs, error);
    }

    return fallback(url, method, error);
  }
}
