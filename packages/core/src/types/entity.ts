/**
 * HTTP methods with a dedicated convenience on the client
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * Response headers keyed by lower-cased name.
 * A header sent more than once keeps each value, in arrival order.
 */
export type ResponseHeaders = Record<string, string[]>;

/**
 * Normalized result of one exchange
 */
export interface ResponseEntity {
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: ResponseHeaders;
  /** Fully buffered response body */
  body: Uint8Array;
}

/**
 * Anything that can enumerate header name/value pairs the way fetch `Headers` does
 */
export interface HeaderSource {
  forEach(callbackfn: (value: string, key: string) => void): void;
}
