#!/usr/bin/env node
/**
 * CLI entry point for sitecheck
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { loadRunConfig, type RunConfig } from './config.js';
import { crawl } from './crawl/crawler.js';
import { parseHeaderRule } from './crawl/header-verifier.js';
import type { CrawlRun, HeaderRule, RecordProgress } from './crawl/types.js';
import { closeAllSessions } from './fetch/http-client.js';
import type { PageFetcher } from './fetch/types.js';
import { assembleReport } from './report/report-assembler.js';
import { formatDuration } from './report/html-report.js';
import { writeReports } from './report/report-writer.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

type ParseResult =
  | { kind: 'ok'; config: RunConfig; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

/**
 * Parse `<seed-url> [-t <ms>] [-h <header>[:<pattern>]]* [-p <dir>]`.
 * Repeating `-h` for the same header keeps the last rule.
 */
export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const rules = new Map<string, HeaderRule>();
  let timeoutMs: number | undefined;
  let outputDir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '-t':
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        const value = args[++i];
        const v = parseInt(value, 10);
        if (isNaN(v) || v <= 0 || String(v) !== value.trim())
          return { kind: 'error', message: `${arg} must be a positive integer (milliseconds)` };
        timeoutMs = v;
        break;
      }
      case '-h':
      case '--header': {
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        const rule = parseHeaderRule(args[++i]);
        rules.delete(rule.name);
        rules.set(rule.name, rule);
        break;
      }
      case '-p':
      case '--path':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        outputDir = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <seed-url> argument' };
  }
  if (positional.length > 1) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(1).join(' ')}`);
  }

  const loaded = loadRunConfig({
    seed: positional[0],
    timeoutMs,
    headerRules: Array.from(rules.values()),
    outputDir,
  });
  if (!loaded.ok) return { kind: 'error', message: loaded.error };

  return { kind: 'ok', config: loaded.config, warnings };
}

function printUsage(): void {
  console.log(`Usage: sitecheck <seed-url> [options]

Crawls every page under <seed-url> on the same origin, one request at a time,
and writes an HTML and a JSON report.

Options:
  -t, --timeout <ms>           Per-request timeout in milliseconds (default: 10000)
  -h, --header <name[:regex]>  Verify a response header is present, or that its
                               value matches <regex>; repeatable
  -p, --path <dir>             Existing directory for the reports (default: cwd)
  -v, --version                Show version number
  --help                       Show this help message

Environment:
  LOG_LEVEL                    trace|debug|info|warn|error|fatal (default: info)`);
}

// ANSI color codes
const colors = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  reset: '\x1b[0m',
} as const;

function statusColor(statusCode: number | undefined): string {
  if (statusCode === undefined) return colors.red;
  if (statusCode >= 200 && statusCode < 300) return colors.green;
  if (statusCode >= 300 && statusCode < 400) return colors.yellow;
  return colors.red;
}

/**
 * One line per processed record: ` * [3/10] [200] 45ms https://example.com/a`.
 * With `color`, the status tag is green for 2xx, yellow for 3xx and red otherwise.
 */
export function formatProgress(event: RecordProgress, color = false): string {
  const { record } = event;
  const position = `[${event.index + 1}/${event.total}]`;
  const tag = `[${record.statusCode ?? 'ERR'}]`;
  const status = color ? `${statusColor(record.statusCode)}${tag}${colors.reset}` : tag;

  if (record.statusCode === undefined) {
    const reason = record.failureReasons[0] ?? 'request failed';
    return ` * ${position} ${status} ${record.uri} (${reason})`;
  }

  const duration = record.requestDuration === undefined ? '' : ` ${record.requestDuration}ms`;
  const unverified = Object.keys(record.headersNotVerified);
  const headerNote = unverified.length > 0 ? ` (unverified: ${unverified.join(', ')})` : '';
  return ` * ${position} ${status}${duration} ${record.uri}${headerNote}`;
}

export function formatSummary(run: CrawlRun, averageResponseMs: number): string[] {
  return [
    `Run started ${run.startedAt.toISOString()}`,
    `Run ended ${run.finishedAt.toISOString()}`,
    `Run took ${formatDuration(run.durationMs)}`,
    '',
    `Total URLs scanned ${run.records.length}`,
    `Average response time (ms) ${averageResponseMs}`,
  ];
}

export interface MainDeps {
  /** Transport override; the httpcloak client is used when absent */
  fetcher?: PageFetcher;
  /** Colour status tags on progress lines; defaults to whether stdout is a TTY */
  color?: boolean;
}

/**
 * Run the CLI and return the process exit code: 1 for startup errors, 0 once
 * a crawl has completed (report write failures included).
 */
export async function main(
  args: string[] = process.argv.slice(2),
  deps: MainDeps = {}
): Promise<number> {
  const result = parseArgs(args);

  switch (result.kind) {
    case 'version':
      console.log(`sitecheck ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { config, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  console.log(`Scanning: ${config.seed}\n`);
  const useColor = deps.color ?? process.stdout.isTTY === true;

  let summary: CrawlRun | undefined;
  try {
    for await (const item of crawl(config.seed, {
      timeout: config.timeoutMs,
      headerRules: config.headerRules,
      fetcher: deps.fetcher,
    })) {
      if (item.type === 'record') {
        console.log(formatProgress(item, useColor));
      } else {
        summary = item;
      }
    }
  } finally {
    await closeAllSessions();
  }

  if (!summary) {
    console.error('Error: crawl ended without a summary');
    return 1;
  }

  const report = assembleReport(summary);
  console.log('');
  for (const line of formatSummary(summary, report.stats.averageResponseMs)) console.log(line);

  const written = await writeReports(report, config.outputDir);
  for (const path of written.written) console.log(`Wrote report to ${path}`);
  for (const failure of written.failures) {
    console.error(`Error: could not write ${failure.path}: ${failure.error}`);
  }

  return 0;
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's native library keeps libuv handles alive; exit explicitly.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
