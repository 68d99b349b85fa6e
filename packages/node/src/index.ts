/**
 * @http-exchange/node
 *
 * HTTP exchange client for Node.js
 */

// Constants
export * from './constants.js';

// Default client and module-level shortcuts
export {
  closeDefaultClient,
  del,
  exchange,
  get,
  getDefaultClient,
  head,
  optionsForAllow,
  patch,
  post,
  put,
} from './client.js';

// HTTP module
export * from './http/index.js';

// Core helpers
export { bodyText, decodeJSON, encodeJSON, getHeader, normalizeHeaders, parseAllowHeader } from '@http-exchange/core';

// Public types
export * from './types/public/index.js';
