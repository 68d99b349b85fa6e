import type { HttpMethod, ResponseEntity, ResponseHeaders } from '@http-exchange/core';

import { ExchangeClient } from './http/fetch-adapter.js';
import type { RequestBody, RequestCallback } from './types/public/index.js';

let defaultClient: ExchangeClient | undefined;

/**
 * Returns the shared client used by the module-level shortcuts,
 * creating it with default timeouts on first use.
 *
 * @example
 * ```typescript
 * import { get, decodeJSON } from '@http-exchange/node';
 *
 * const entity = await get('https://api.example.com/items');
 * const items = decodeJSON<string[]>(entity.body);
 * ```
 */
export function getDefaultClient(): ExchangeClient {
  defaultClient ??= new ExchangeClient();
  return defaultClient;
}

/**
 * Closes the shared client, if it was created. The next shortcut call creates a new one.
 */
export async function closeDefaultClient(): Promise<void> {
  const client = defaultClient;
  defaultClient = undefined;
  await client?.close();
}

export function exchange(
  url: string,
  method: HttpMethod | (string & {}),
  body?: RequestBody | null,
  callback?: RequestCallback | null
): Promise<ResponseEntity> {
  return getDefaultClient().exchange(url, method, body, callback);
}

export function get(url: string, callback?: RequestCallback | null): Promise<ResponseEntity> {
  return getDefaultClient().get(url, callback);
}

export function head(url: string, callback?: RequestCallback | null): Promise<ResponseHeaders> {
  return getDefaultClient().head(url, callback);
}

export function post(url: string, body?: RequestBody | null, callback?: RequestCallback | null): Promise<ResponseEntity> {
  return getDefaultClient().post(url, body, callback);
}

export function put(url: string, body?: RequestBody | null, callback?: RequestCallback | null): Promise<ResponseEntity> {
  return getDefaultClient().put(url, body, callback);
}

export function patch(url: string, body?: RequestBody | null, callback?: RequestCallback | null): Promise<ResponseEntity> {
  return getDefaultClient().patch(url, body, callback);
}

/** `delete` is reserved at module level */
export function del(url: string, callback?: RequestCallback | null): Promise<void> {
  return getDefaultClient().delete(url, callback);
}

export function optionsForAllow(url: string, callback?: RequestCallback | null): Promise<string[]> {
  return getDefaultClient().optionsForAllow(url, callback);
}
