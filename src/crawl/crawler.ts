/**
 * Main crawl orchestrator — sequential, discovery-order traversal of one origin
 */
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../fetch/constants.js';
import { httpRequest, toFetchFailure } from '../fetch/http-client.js';
import type { FetchOutcome, PageFetcher } from '../fetch/types.js';
import { logger } from '../logger.js';
import type { CrawlRecord } from './crawl-record.js';
import { verifyHeaders } from './header-verifier.js';
import { extractLinks } from './link-extractor.js';
import { RecordQueue } from './record-queue.js';
import type { CrawlOptions, CrawlRun, HeaderRule, RecordProgress } from './types.js';

/**
 * One crawl run. Owns the record queue; records are processed strictly one at
 * a time, and record N+1 is not started before record N's extraction is done.
 */
export class CrawlSession {
  readonly queue: RecordQueue;
  readonly timeoutMs: number;
  readonly headerRules: readonly HeaderRule[];
  private readonly fetcher: PageFetcher;
  private readonly now: () => Date;

  constructor(seed: string, options: CrawlOptions = {}) {
    this.queue = new RecordQueue(seed);
    this.timeoutMs = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headerRules = options.headerRules ?? [];
    this.fetcher = options.fetcher ?? ((url, opts) => httpRequest(url, opts));
    this.now = options.now ?? (() => new Date());
  }

  get seed(): string {
    return this.queue.base.href;
  }

  /**
   * Walk the queue until the cursor catches up with it, yielding each record
   * once its step is done, then a summary.
   *
   * Terminates only when the set of reachable in-origin URLs is finite; a site
   * that generates endless distinct URLs (query permutations) keeps it going.
   */
  async *run(): AsyncGenerator<RecordProgress | CrawlRun> {
    const startedAt = this.now();
    logger.info({ seed: this.seed, timeoutMs: this.timeoutMs }, 'Starting crawl');

    for (let entry = this.queue.next(); entry; entry = this.queue.next()) {
      await this.processRecord(entry.record);
      yield { type: 'record', index: entry.index, total: this.queue.size, record: entry.record };
    }

    const finishedAt = this.now();
    const durationMs = finishedAt.getTime() - startedAt.getTime();
    logger.info({ seed: this.seed, records: this.queue.size, durationMs }, 'Crawl complete');

    yield {
      type: 'summary',
      seed: this.seed,
      startedAt,
      finishedAt,
      durationMs,
      timeoutMs: this.timeoutMs,
      headerRules: [...this.headerRules],
      records: this.queue.all(),
    };
  }

  /**
   * Fetch one record and process the response. The finish timestamp is taken
   * as soon as the fetch returns, before verification and extraction. A
   * transport failure ends the step with a failure reason and no status.
   */
  async processRecord(record: CrawlRecord): Promise<void> {
    record.state = 'fetching';
    record.requestStartedAt = this.now();

    const outcome = await this.fetch(record.uri);

    if (!outcome.success) {
      record.state = 'failed';
      record.failureReasons.push(`Request failed (${outcome.error}): ${outcome.message}`);
      logger.warn({ uri: record.uri, error: outcome.error }, 'Fetch failed');
      return;
    }

    record.requestFinishedAt = this.now();
    record.state = 'fetched';
    record.statusCode = outcome.statusCode;
    record.statusDescription = outcome.statusText;
    record.headers = outcome.headers;

    if (this.headerRules.length > 0) {
      verifyHeaders(record, this.headerRules);
    }

    const discovered = extractLinks(record, outcome.body, this.queue);

    logger.debug(
      {
        uri: record.uri,
        statusCode: record.statusCode,
        durationMs: record.requestDuration,
        links: record.linksTo.length,
        discovered,
      },
      'Processed record'
    );
  }

  /** Run the fetcher, folding a thrown error into a failed outcome. */
  private async fetch(uri: string): Promise<FetchOutcome> {
    try {
      return await this.fetcher(uri, { timeoutMs: this.timeoutMs });
    } catch (error) {
      return toFetchFailure(error);
    }
  }
}

/**
 * Crawl a website starting from the given URL.
 * Yields a RecordProgress per processed record, then the CrawlRun summary.
 */
export function crawl(
  seed: string,
  options: CrawlOptions = {}
): AsyncGenerator<RecordProgress | CrawlRun> {
  return new CrawlSession(seed, options).run();
}

/** Crawl to completion and return only the summary. */
export async function crawlToCompletion(seed: string, options: CrawlOptions = {}): Promise<CrawlRun> {
  let summary: CrawlRun | undefined;
  for await (const item of crawl(seed, options)) {
    if (item.type === 'summary') summary = item;
  }
  if (!summary) throw new Error('Crawl ended without a summary');
  return summary;
}
