/**
 * sitecheck - crawl one site from a seed URL, record per-page HTTP outcomes,
 * verify response headers and produce HTML/JSON reports.
 *
 * @module sitecheck
 */
export {
  crawl,
  crawlToCompletion,
  CrawlSession,
  CrawlRecord,
  RecordQueue,
  isInOrigin,
  normalizeUri,
  extractLinks,
  extractHrefs,
  verifyHeaders,
  parseHeaderRule,
} from './crawl/index.js';
export { httpRequest, closeAllSessions, DEFAULT_REQUEST_TIMEOUT_MS } from './fetch/index.js';
export {
  assembleReport,
  renderHtmlReport,
  renderJsonReport,
  writeReports,
} from './report/index.js';
export { loadRunConfig, RunConfigSchema } from './config.js';
export type {
  CrawlOptions,
  CrawlRun,
  CrawlRecordJson,
  HeaderRule,
  RecordProgress,
  RecordState,
} from './crawl/index.js';
export type { FetchOutcome, FetchSuccess, FetchFailure, PageFetcher } from './fetch/index.js';
export type { CrawlReport, RecordView, ReportStats, ReportWriteResult } from './report/index.js';
export type { RunConfig } from './config.js';
