export type { CodecErrorCode, ExchangeErrorCode } from './errors.js';

export type { HeaderSource, HttpMethod, ResponseEntity, ResponseHeaders } from './entity.js';
