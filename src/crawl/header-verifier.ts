/**
 * Response header verification against operator-supplied rules
 */
import type { CrawlRecord } from './crawl-record.js';
import { hasOwn, setOwn } from '../utils.js';
import type { HeaderRule } from './types.js';

/**
 * Split a `-h` argument into a rule: `name` checks presence, `name:pattern`
 * also matches the value against `pattern`. Splits on the first colon only,
 * so patterns may contain colons. An empty pattern (`name:`) is presence-only.
 * Names are not validated here; see RunConfigSchema.
 */
export function parseHeaderRule(input: string): HeaderRule {
  const sep = input.indexOf(':');
  const name = (sep === -1 ? input : input.slice(0, sep)).trim().toLowerCase();
  const pattern = sep === -1 ? '' : input.slice(sep + 1).trim();
  return { name, pattern: pattern || null };
}

/** Whether a single rule holds for a lower-cased header map. */
export function ruleHolds(rule: HeaderRule, headers: Record<string, string>): boolean {
  if (!hasOwn(headers, rule.name)) return false;
  if (rule.pattern === null) return true;

  const value = headers[rule.name];
  if (!value) return false;
  return new RegExp(rule.pattern).test(value);
}

/**
 * Sort each rule into `headersVerified` or `headersNotVerified` on the
 * record. A rule key ends up in exactly one of the two; re-running moves it
 * if the outcome changed. Records nothing in `failureReasons`.
 */
export function verifyHeaders(record: CrawlRecord, rules: readonly HeaderRule[]): void {
  for (const rule of rules) {
    const key = rule.name.toLowerCase();
    const normalized: HeaderRule = { name: key, pattern: rule.pattern };

    if (ruleHolds(normalized, record.headers)) {
      delete record.headersNotVerified[key];
      setOwn(record.headersVerified, key, rule.pattern);
    } else {
      delete record.headersVerified[key];
      setOwn(record.headersNotVerified, key, rule.pattern);
    }
  }
}
