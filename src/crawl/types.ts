/**
 * Types for the crawl module
 */
import type { PageFetcher } from '../fetch/types.js';
import type { CrawlRecord } from './crawl-record.js';

/**
 * Lifecycle of a record. `queued` until the engine reaches it, `fetching`
 * while the request is in flight, then `fetched` or `failed` (transport
 * failure only; an HTTP error status is still `fetched`).
 */
export type RecordState = 'queued' | 'fetching' | 'fetched' | 'failed';

/** Lower-cased header name to its value, multi-valued headers space-joined. */
export type HeaderMap = Record<string, string>;

/** Rule key to the rule's expected pattern, `null` for presence-only rules. */
export type HeaderPartition = Record<string, string | null>;

/**
 * Operator-supplied expectation about a response header. `pattern` is matched
 * as an unanchored regular expression; `null` only checks presence.
 */
export interface HeaderRule {
  name: string;
  pattern: string | null;
}

export interface CrawlOptions {
  /** Per-request timeout in milliseconds (default: 10000) */
  timeout?: number;
  headerRules?: HeaderRule[];
  /** Transport used for every request; defaults to the httpcloak client */
  fetcher?: PageFetcher;
  /** Clock used for request and run timestamps */
  now?: () => Date;
}

/** Yielded after each record's step completes, in discovery order. */
export interface RecordProgress {
  type: 'record';
  /** Zero-based position of the record in the collection */
  index: number;
  /** Collection size at the time the record finished */
  total: number;
  record: CrawlRecord;
}

/** Yielded once, after the queue is exhausted. */
export interface CrawlRun {
  type: 'summary';
  seed: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  timeoutMs: number;
  headerRules: HeaderRule[];
  records: readonly CrawlRecord[];
}
