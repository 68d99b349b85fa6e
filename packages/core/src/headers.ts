/**
 * Header utilities shared by every runtime.
 */

import type { HeaderSource, ResponseHeaders } from './types/entity.js';

/**
 * Collects fetch-style headers into a {@link ResponseHeaders} map with lowercase keys.
 * Repeated headers (e.g. `set-cookie`) keep one entry per value.
 */
export function normalizeHeaders(headers: HeaderSource): ResponseHeaders {
  const result: ResponseHeaders = {};
  headers.forEach((value, key) => {
    const name = key.toLowerCase();
    const values = result[name];
    if (values) {
      values.push(value);
    } else {
      result[name] = [value];
    }
  });
  return result;
}

/**
 * Returns the first value of a header, matching the name case-insensitively
 */
export function getHeader(headers: ResponseHeaders, name: string): string | undefined {
  return headers[name.toLowerCase()]?.[0];
}

/**
 * Splits an `Allow` header value into method tokens.
 *
 * The split is a raw comma split: `"POST, GET"` becomes `["POST", " GET"]`.
 * An absent or empty value yields an empty list.
 */
export function parseAllowHeader(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value.split(',');
}
