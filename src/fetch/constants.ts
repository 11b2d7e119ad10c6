/** Per-request timeout when none is configured */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;
