/**
 * Report module barrel exports
 */
export { assembleReport, computeStats, statusClass } from './report-assembler.js';
export { renderHtmlReport, formatDuration } from './html-report.js';
export { renderJsonReport } from './json-report.js';
export { writeReports, reportBaseName } from './report-writer.js';
export type {
  CrawlReport,
  RecordView,
  ReportStats,
  ReportWriteResult,
  StatusClass,
} from './types.js';
