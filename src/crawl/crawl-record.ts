/**
 * Per-URI unit of crawl state and outcome
 */
import type { HeaderMap, HeaderPartition, RecordState } from './types.js';

/** JSON shape of a record as written to the structured report. */
export interface CrawlRecordJson {
  id: number;
  uri: string;
  state: RecordState;
  requestStartedAt: string | null;
  requestFinishedAt: string | null;
  requestDurationMs: number | null;
  statusCode: number | null;
  statusDescription: string | null;
  headers: HeaderMap;
  headersVerified: HeaderPartition;
  headersNotVerified: HeaderPartition;
  failureReasons: string[];
  linksTo: number[];
}

export class CrawlRecord {
  state: RecordState = 'queued';
  requestStartedAt?: Date;
  requestFinishedAt?: Date;
  statusCode?: number;
  statusDescription?: string;
  headers: HeaderMap = {};
  headersVerified: HeaderPartition = {};
  headersNotVerified: HeaderPartition = {};
  readonly failureReasons: string[] = [];
  /** Ids of in-origin records this page links to, in discovery order (repeats kept) */
  linksTo: number[] = [];

  constructor(
    readonly id: number,
    readonly uri: string
  ) {}

  /** Milliseconds between request start and finish, undefined until both are stamped. */
  get requestDuration(): number | undefined {
    if (!this.requestStartedAt || !this.requestFinishedAt) return undefined;
    return this.requestFinishedAt.getTime() - this.requestStartedAt.getTime();
  }

  /** True once the record has a response and every header rule was verified. */
  get passed(): boolean {
    return (
      this.state === 'fetched' &&
      this.failureReasons.length === 0 &&
      Object.keys(this.headersNotVerified).length === 0
    );
  }

  toJSON(): CrawlRecordJson {
    return {
      id: this.id,
      uri: this.uri,
      state: this.state,
      requestStartedAt: this.requestStartedAt?.toISOString() ?? null,
      requestFinishedAt: this.requestFinishedAt?.toISOString() ?? null,
      requestDurationMs: this.requestDuration ?? null,
      statusCode: this.statusCode ?? null,
      statusDescription: this.statusDescription ?? null,
      headers: { ...this.headers },
      headersVerified: { ...this.headersVerified },
      headersNotVerified: { ...this.headersNotVerified },
      failureReasons: [...this.failureReasons],
      linksTo: [...this.linksTo],
    };
  }
}
