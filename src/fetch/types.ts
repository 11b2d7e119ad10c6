/**
 * Shared types for the fetch module
 */

export type FetchError = 'timeout' | 'network_error';

export interface FetchRequestOptions {
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

export interface FetchSuccess {
  success: true;
  statusCode: number;
  statusText: string;
  /** Lower-cased header names, multi-valued headers space-joined */
  headers: Record<string, string>;
  /** Response body; byte bodies are decoded as UTF-8 before link extraction */
  body: string | Uint8Array;
}

export interface FetchFailure {
  success: false;
  error: FetchError;
  message: string;
}

/** Any HTTP status is a success here; only transport-level problems fail. */
export type FetchOutcome = FetchSuccess | FetchFailure;

/** Transport contract used by the crawl engine. */
export type PageFetcher = (url: string, options: FetchRequestOptions) => Promise<FetchOutcome>;
