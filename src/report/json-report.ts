/**
 * Structured (JSON) dump of a crawl report
 */
import type { CrawlReport } from './types.js';

export function renderJsonReport(report: CrawlReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
