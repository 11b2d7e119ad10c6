/**
 * Write the HTML and JSON reports for a run to disk
 */
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../logger.js';
import { renderHtmlReport } from './html-report.js';
import { renderJsonReport } from './json-report.js';
import type { CrawlReport, ReportWriteResult } from './types.js';

const pad = (n: number): string => String(n).padStart(2, '0');

/** `report-<yyyy-MM-dd-HH-mm-ss>-<host>`, local time. */
export function reportBaseName(date: Date, host: string): string {
  const stamp = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('-');
  const safeHost = host.replace(/[^a-zA-Z0-9.-]/g, '_');
  return `report-${stamp}-${safeHost}`;
}

/**
 * Render and write both report files into `outputDir`.
 * Each file is attempted independently; failures are collected and logged,
 * never thrown, since the crawl they describe has already finished.
 */
export async function writeReports(
  report: CrawlReport,
  outputDir: string,
  date: Date = new Date()
): Promise<ReportWriteResult> {
  const base = join(outputDir, reportBaseName(date, report.config.host));
  const files: Array<[path: string, render: () => string]> = [
    [`${base}.html`, () => renderHtmlReport(report)],
    [`${base}.json`, () => renderJsonReport(report)],
  ];

  const result: ReportWriteResult = { written: [], failures: [] };

  for (const [path, render] of files) {
    try {
      await writeFile(path, render(), 'utf-8');
      result.written.push(path);
      logger.info({ path }, 'Wrote report');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path, error: message }, 'Failed to write report');
      result.failures.push({ path, error: message });
    }
  }

  return result;
}
