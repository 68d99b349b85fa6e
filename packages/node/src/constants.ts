// Timeouts
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000; // Upper bound on one whole exchange (10 seconds)
export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000; // Upper bound on connect + TLS handshake (5 seconds)

// JSON request callback header values
export const JSON_CONTENT_TYPE = 'application/json';
export const NO_CACHE = 'no-cache';
