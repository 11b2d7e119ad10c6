/**
 * Crawl module barrel exports
 */
export { crawl, crawlToCompletion, CrawlSession } from './crawler.js';
export { CrawlRecord } from './crawl-record.js';
export { RecordQueue } from './record-queue.js';
export { isInOrigin, normalizeUri } from './origin-guard.js';
export { extractLinks, extractHrefs } from './link-extractor.js';
export { verifyHeaders, parseHeaderRule } from './header-verifier.js';
export type { CrawlRecordJson } from './crawl-record.js';
export type { CrawlOptions, CrawlRun, HeaderRule, RecordProgress, RecordState } from './types.js';
