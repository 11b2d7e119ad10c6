/**
 * Extract links from HTML and feed them into the crawl queue
 */
import { parseHTML } from 'linkedom';
import type { CrawlRecord } from './crawl-record.js';
import type { RecordQueue } from './record-queue.js';

const utf8 = new TextDecoder('utf-8');

/**
 * Raw `href` attribute values of every `<a href>` in document order.
 * A document that fails to parse yields no links.
 */
export function extractHrefs(html: string): string[] {
  try {
    const { document } = parseHTML(html);
    const hrefs: string[] = [];
    for (const anchor of document.querySelectorAll('a[href]')) {
      const href = anchor.getAttribute('href');
      if (href !== null) hrefs.push(href);
    }
    return hrefs;
  } catch {
    return [];
  }
}

/**
 * Resolve a raw href against the page it was found on.
 * Returns null for hrefs that are blank or do not resolve.
 */
export function resolveHref(href: string, pageUri: string): URL | null {
  const trimmed = href.trim();
  if (!trimmed) return null;
  try {
    return new URL(trimmed, pageUri);
  } catch {
    return null;
  }
}

/**
 * Discover in-origin links in a fetched page.
 *
 * Each href is resolved against the record's own URI. Links outside the
 * origin or that fail to resolve are skipped. Known targets only gain an
 * edge; new targets are appended to the queue first. `record.linksTo` is
 * replaced with the page's edges, so running this twice on the same body
 * leaves the same edges and creates no further records.
 * Returns the number of new records created.
 */
export function extractLinks(
  record: CrawlRecord,
  body: string | Uint8Array,
  queue: RecordQueue
): number {
  const html = typeof body === 'string' ? body : utf8.decode(body);
  const edges: number[] = [];
  let created = 0;

  for (const href of extractHrefs(html)) {
    const resolved = resolveHref(href, record.uri);
    if (!resolved) continue;

    const admitted = queue.admit(resolved);
    if (!admitted) continue;

    if (admitted.created) created++;
    edges.push(admitted.record.id);
  }

  record.linksTo = edges;
  return created;
}
