/**
 * Turn a finished crawl into report data. Reads records, never mutates them.
 */
import type { CrawlRecord } from '../crawl/crawl-record.js';
import type { CrawlRun } from '../crawl/types.js';
import type { CrawlReport, ReportStats, StatusClass } from './types.js';

export function statusClass(code: number): StatusClass {
  if (code >= 200 && code < 300) return '2xx';
  if (code >= 300 && code < 400) return '3xx';
  return 'other';
}

export function computeStats(records: readonly CrawlRecord[], durationMs: number): ReportStats {
  const statusClasses: Record<StatusClass, number> = { '2xx': 0, '3xx': 0, other: 0 };
  const hits = new Map<number, number>();
  const durations: number[] = [];
  let completedRecords = 0;
  let failedRecords = 0;
  let unverifiedRecords = 0;

  for (const record of records) {
    if (record.state === 'failed') failedRecords++;
    if (Object.keys(record.headersNotVerified).length > 0) unverifiedRecords++;

    if (record.statusCode !== undefined) {
      completedRecords++;
      statusClasses[statusClass(record.statusCode)]++;
      hits.set(record.statusCode, (hits.get(record.statusCode) ?? 0) + 1);
    }

    const duration = record.requestDuration;
    if (duration !== undefined) durations.push(duration);
  }

  const averageResponseMs =
    durations.length === 0
      ? 0
      : Math.round(durations.reduce((a, b) => a + b, 0) / durations.length);

  return {
    totalRecords: records.length,
    completedRecords,
    failedRecords,
    unverifiedRecords,
    statusClasses,
    statusCodeHits: Array.from(hits.entries())
      .sort((a, b) => a[0] - b[0])
      .map(([code, count]) => ({ code, count })),
    averageResponseMs,
    durationMs,
  };
}

export function assembleReport(run: CrawlRun): CrawlReport {
  return {
    run: {
      startedAt: run.startedAt.toISOString(),
      finishedAt: run.finishedAt.toISOString(),
      durationMs: run.durationMs,
    },
    config: {
      seed: run.seed,
      host: new URL(run.seed).hostname,
      timeoutMs: run.timeoutMs,
      headerRules: run.headerRules.map((rule) => ({ ...rule })),
    },
    stats: computeStats(run.records, run.durationMs),
    records: run.records.map((record) => ({ ...record.toJSON(), passed: record.passed })),
  };
}
