/**
 * JSON helpers around exchange bodies.
 */

import { ExchangeError } from './errors.js';
import type { ResponseEntity } from './types/entity.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Serializes a value to JSON and returns it as a single-chunk byte stream,
 * ready to be used as a request body. The JSON text is terminated by a newline.
 *
 * @throws {ExchangeError} `serialize_error` when the value has no JSON form
 * (circular references, BigInt, `undefined`, functions)
 */
export function encodeJSON(value: unknown): ReadableStream<Uint8Array> {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Failed to serialize value';
    throw new ExchangeError(`Serialize error: ${message}`, 'serialize_error', error);
  }
  if (text === undefined) {
    throw new ExchangeError('Serialize error: value has no JSON representation', 'serialize_error');
  }

  const bytes = encoder.encode(`${text}\n`);
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
  });
}

/**
 * Parses UTF-8 JSON bytes (or text).
 *
 * The result is not validated against `T`; callers that accept untrusted
 * bodies should check its shape.
 *
 * @throws {ExchangeError} `parse_error` on malformed input
 */
export function decodeJSON<T = unknown>(data: Uint8Array | string): T {
  const text = typeof data === 'string' ? data : decoder.decode(data);
  try {
    return JSON.parse(text) as T;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Failed to parse JSON';
    throw new ExchangeError(`Parse error: ${message}`, 'parse_error', error);
  }
}

/**
 * Decodes an entity body as UTF-8 text
 */
export function bodyText(entity: Pick<ResponseEntity, 'body'>): string {
  return decoder.decode(entity.body);
}
