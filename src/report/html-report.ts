/**
 * Render a crawl report as a standalone HTML page
 */
import { parseHTML } from 'linkedom';
import type { HeaderRule } from '../crawl/types.js';
import type { CrawlReport, RecordView } from './types.js';

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 2rem; }
table { border-collapse: collapse; width: 100%; }
th, td { border: 1px solid #ccc; padding: 0.25rem 0.5rem; text-align: left; vertical-align: top; }
tr.failed td { background: #fdecea; }
tr.unverified td { background: #fff8e1; }
ul.plain { margin: 0; padding-left: 1rem; }
`;

/** Human-readable duration: `850ms`, `12.35s`, `2m 5.10s`. */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(2);
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

export function describeRule(rule: Pick<HeaderRule, 'name' | 'pattern'>): string {
  return rule.pattern === null ? `${rule.name} (present)` : `${rule.name} matches /${rule.pattern}/`;
}

function rowClass(record: RecordView): string | null {
  if (record.state === 'failed') return 'failed';
  if (Object.keys(record.headersNotVerified).length > 0) return 'unverified';
  return null;
}

export function renderHtmlReport(report: CrawlReport): string {
  const { document } = parseHTML(
    '<!DOCTYPE html><html lang="en"><head></head><body></body></html>'
  );

  type El = ReturnType<typeof document.createElement>;

  function el(tag: string, text?: string | number, attrs: Record<string, string> = {}): El {
    const node = document.createElement(tag);
    if (text !== undefined) node.textContent = String(text);
    for (const [name, value] of Object.entries(attrs)) node.setAttribute(name, value);
    return node;
  }

  function list(items: string[], className?: string): El {
    const ul = el('ul', undefined, className ? { class: className } : {});
    for (const item of items) ul.append(el('li', item));
    return ul;
  }

  function statItem(label: string, value: string | number): El {
    const li = el('li', `${label}: `);
    li.append(el('strong', value));
    return li;
  }

  const title = `sitecheck: ${report.config.seed}`;
  document.head.append(
    el('meta', undefined, { charset: 'utf-8' }),
    el('meta', undefined, { name: 'viewport', content: 'width=device-width, initial-scale=1' }),
    el('title', title),
    el('style', STYLE)
  );

  const body = document.body;
  body.append(el('h1', title));

  const { stats } = report;
  body.append(el('h2', 'Stats'));
  const statsList = el('ul', undefined, { id: 'stats' });
  statsList.append(
    statItem('Run started', report.run.startedAt),
    statItem('Run ended', report.run.finishedAt),
    statItem('Run took', formatDuration(report.run.durationMs)),
    statItem('Total URLs scanned', stats.totalRecords),
    statItem('Failed requests', stats.failedRecords),
    statItem('URLs with unverified headers', stats.unverifiedRecords),
    statItem('Average response time', `${stats.averageResponseMs}ms`)
  );
  body.append(statsList);

  body.append(el('h2', 'HTTP Response Codes'));
  const classList = el('ul', undefined, { id: 'status-classes' });
  for (const [name, count] of Object.entries(stats.statusClasses)) {
    classList.append(statItem(name, count));
  }
  body.append(classList);

  const hits = el('ul', undefined, { id: 'status-codes' });
  for (const { code, count } of stats.statusCodeHits) hits.append(el('li', `${code}: ${count}`));
  body.append(hits);

  if (report.config.headerRules.length > 0) {
    body.append(el('h2', 'Header Rules'));
    body.append(list(report.config.headerRules.map(describeRule)));
  }

  body.append(el('h2', 'URLs'));
  const table = el('table', undefined, { id: 'records' });
  const headRow = el('tr');
  for (const heading of [
    '#',
    'URL',
    'Request Started',
    'Request Finished',
    'Response Time',
    'HTTP Status',
    'Headers Verified',
    'Headers Not Verified',
    'Failure Reasons',
  ]) {
    headRow.append(el('th', heading));
  }
  const thead = el('thead');
  thead.append(headRow);
  table.append(thead);

  const tbody = el('tbody');
  for (const record of report.records) {
    const className = rowClass(record);
    const row = el('tr', undefined, className ? { class: className } : {});

    const link = el('a', record.uri, { href: record.uri });
    const uriCell = el('td');
    uriCell.append(link);

    const status =
      record.statusCode === null
        ? ''
        : `${record.statusCode} ${record.statusDescription ?? ''}`.trim();

    const cells: El[] = [
      el('td', record.id),
      uriCell,
      el('td', record.requestStartedAt ?? ''),
      el('td', record.requestFinishedAt ?? ''),
      el('td', record.requestDurationMs === null ? '' : `${record.requestDurationMs}ms`),
      el('td', status),
    ];

    for (const partition of [record.headersVerified, record.headersNotVerified]) {
      const cell = el('td');
      const rules = Object.entries(partition).map(([name, pattern]) =>
        describeRule({ name, pattern })
      );
      if (rules.length > 0) cell.append(list(rules, 'plain'));
      cells.push(cell);
    }

    const failures = el('td');
    if (record.failureReasons.length > 0) failures.append(list(record.failureReasons, 'plain'));
    cells.push(failures);

    row.append(...cells);
    tbody.append(row);
  }
  table.append(tbody);
  body.append(table);

  return document.toString();
}
