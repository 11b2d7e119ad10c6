/**
 * Public API exports for the fetch module
 */
export { httpRequest, getSession, closeAllSessions, normalizeHeaders } from './http-client.js';
export { DEFAULT_REQUEST_TIMEOUT_MS } from './constants.js';
export type { FetchOutcome, FetchSuccess, FetchFailure, FetchError, PageFetcher } from './types.js';
