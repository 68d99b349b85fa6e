/**
 * Error codes raised by the JSON codec helpers
 */
export type CodecErrorCode = 'serialize_error' | 'parse_error';

/**
 * All error codes raised by the core package
 */
export type ExchangeErrorCode = CodecErrorCode | 'invalid_options' | 'exchange_error';
