/**
 * Types for the report module
 */
import type { CrawlRecordJson } from '../crawl/crawl-record.js';
import type { HeaderRule } from '../crawl/types.js';

export type StatusClass = '2xx' | '3xx' | 'other';

export interface ReportStats {
  totalRecords: number;
  /** Records that received a response (any status) */
  completedRecords: number;
  /** Records whose fetch failed at the transport level */
  failedRecords: number;
  /** Records with at least one header rule in `headersNotVerified` */
  unverifiedRecords: number;
  /** Completed records grouped by status class */
  statusClasses: Record<StatusClass, number>;
  /** Completed records per status code, ascending by code */
  statusCodeHits: Array<{ code: number; count: number }>;
  /** Mean request duration over completed records, 0 when none completed */
  averageResponseMs: number;
  durationMs: number;
}

export interface RecordView extends CrawlRecordJson {
  /** Response received, no failure reasons and every header rule verified */
  passed: boolean;
}

export interface CrawlReport {
  run: {
    startedAt: string;
    finishedAt: string;
    durationMs: number;
  };
  config: {
    seed: string;
    host: string;
    timeoutMs: number;
    headerRules: HeaderRule[];
  };
  stats: ReportStats;
  records: RecordView[];
}

export interface ReportWriteFailure {
  path: string;
  error: string;
}

export interface ReportWriteResult {
  written: string[];
  failures: ReportWriteFailure[];
}
