import type { Request } from 'undici';

import { JSON_CONTENT_TYPE, NO_CACHE } from '../constants.js';

/**
 * Request callback that marks the request as a JSON exchange.
 * Sets `Accept` and `Content-Type` to `application/json` and disables caching.
 */
export function jsonRequestCallback(request: Request): void {
  request.headers.set('Accept', JSON_CONTENT_TYPE);
  request.headers.set('Content-Type', JSON_CONTENT_TYPE);
  request.headers.set('Cache-Control', NO_CACHE);
}
