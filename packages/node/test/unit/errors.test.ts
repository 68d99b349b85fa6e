import {
  createBodyReadError,
  createCallbackError,
  createHookError,
  createInvalidRequestError,
  createNetworkError,
  createTimeoutError,
  ExchangeError,
  ExchangeHttpError,
  isExchangeError,
  isExchangeHttpError,
  isTimeoutError,
} from '../../src/http';
import type { AnyExchangeErrorCode } from '../../src/http';

const ITEMS_URL = 'https://api.example.com/items';

describe('ExchangeHttpError', () => {
  it('should carry url, method and empty headers', () => {
    const error = new ExchangeHttpError({ code: 'network_error', message: 'Network error: down', url: ITEMS_URL, method: 'GET' });

    expect(error.name).toBe('ExchangeHttpError');
    expect(error.code).toBe('network_error');
    expect(error.url).toBe(ITEMS_URL);
    expect(error.method).toBe('GET');
    expect(error.headers).toEqual({});
  });

  it('should be instanceof Error and ExchangeError', () => {
    const error = createNetworkError(ITEMS_URL, 'GET', new Error('down'));

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ExchangeError);
    expect(isExchangeError(error)).toBe(true);
    expect(isExchangeHttpError(error)).toBe(true);
    expect(isExchangeHttpError(new ExchangeError('plain'))).toBe(false);
  });

  it('should serialize to string correctly', () => {
    const error = createTimeoutError(ITEMS_URL, 'POST', 200);

    expect(error.toString()).toBe(
      'ExchangeHttpError [timeout]: Request timed out after 200ms\n  Method: POST\n  URL: https://api.example.com/items'
    );
  });

  it('should serialize to JSON correctly', () => {
    const error = createBodyReadError(ITEMS_URL, 'GET', new Error('connection reset'));

    expect(error.toJSON()).toEqual({
      name: 'ExchangeHttpError',
      code: 'body_read_error',
      message: 'Body read error: connection reset',
      url: ITEMS_URL,
      method: 'GET',
    });
  });
});

describe('error factories', () => {
  it('should fall back to a generic message when the cause is not an Error', () => {
    expect(createNetworkError(ITEMS_URL, 'GET', 'boom').message).toBe('Network error: Network request failed');
    expect(createInvalidRequestError(ITEMS_URL, 'GET', 42).message).toBe(
      'Invalid request: Request could not be constructed'
    );
    expect(createCallbackError(ITEMS_URL, 'GET', null).message).toBe('Request callback failed: Request callback threw');
    expect(createBodyReadError(ITEMS_URL, 'GET', undefined).message).toBe('Body read error: Failed to read response body');
    expect(createHookError(ITEMS_URL, 'GET', 'nope').message).toBe('Hook failed: Observability hook threw');
  });

  it('should keep the cause', () => {
    const cause = new TypeError('Invalid URL');

    expect(createInvalidRequestError('nope', 'GET', cause).cause).toBe(cause);
  });
});

describe('AnyExchangeErrorCode', () => {
  it('should cover core and HTTP codes', () => {
    const codes: AnyExchangeErrorCode[] = ['parse_error', 'invalid_options', 'hook_error', 'timeout'];

    expect(codes.map((code) => new ExchangeError('Failed', code).code)).toEqual([
      'parse_error',
      'invalid_options',
      'hook_error',
      'timeout',
    ]);
  });
});

describe('isTimeoutError', () => {
  it('should only match timeout exchange errors', () => {
    expect(isTimeoutError(createTimeoutError(ITEMS_URL, 'GET', 10))).toBe(true);
    expect(isTimeoutError(createNetworkError(ITEMS_URL, 'GET', new Error('down')))).toBe(false);
    expect(isTimeoutError(new Error('timeout'))).toBe(false);
  });
});
