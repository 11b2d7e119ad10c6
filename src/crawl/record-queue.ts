/**
 * Append-only crawl queue with URI dedup, origin confinement and a
 * discovery-order cursor
 */
import { CrawlRecord } from './crawl-record.js';
import { isInOrigin, normalizeUri } from './origin-guard.js';

export class RecordQueue {
  private readonly records: CrawlRecord[] = [];
  private readonly byUri = new Map<string, CrawlRecord>();
  private cursor = 0;
  readonly base: URL;

  /** Seeds the queue with one record for the start URL. */
  constructor(seed: string | URL) {
    const normalized = normalizeUri(seed);
    if (!normalized) {
      throw new TypeError(`Seed is not an absolute URL: ${String(seed)}`);
    }
    this.base = new URL(normalized);
    this.append(normalized);
  }

  /**
   * Return the existing record for an in-origin URL or create one at the end
   * of the queue. Returns null for URLs outside the origin; never removes or
   * replaces a record.
   */
  admit(url: URL): { record: CrawlRecord; created: boolean } | null {
    const normalized = normalizeUri(url);
    if (!normalized) return null;

    const existing = this.byUri.get(normalized);
    if (existing) return { record: existing, created: false };

    if (!isInOrigin(this.base, new URL(normalized))) return null;
    return { record: this.append(normalized), created: true };
  }

  /**
   * Next unvisited record in discovery order, or null once the cursor has
   * caught up with the collection. The length is re-read on every call, so
   * records added while processing are picked up.
   */
  next(): { index: number; record: CrawlRecord } | null {
    if (this.cursor >= this.records.length) return null;
    const index = this.cursor++;
    return { index, record: this.records[index] };
  }

  get size(): number {
    return this.records.length;
  }

  /** Read-only view of the whole collection in discovery order. */
  all(): readonly CrawlRecord[] {
    return this.records;
  }

  private append(normalized: string): CrawlRecord {
    const record = new CrawlRecord(this.records.length + 1, normalized);
    this.records.push(record);
    this.byUri.set(normalized, record);
    return record;
  }
}
