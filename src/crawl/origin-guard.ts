/**
 * Origin confinement and URI normalization for dedup
 */

/**
 * Normalize a URL for deduplication.
 * Parses and re-serializes (lowercases scheme and host, drops default ports,
 * percent-encodes the path) and strips the fragment. Trailing slashes and
 * query strings are significant and kept.
 * Returns null when the input is not an absolute URL.
 */
export function normalizeUri(url: string | URL): string | null {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    return parsed.href;
  } catch {
    return null;
  }
}

/** Path prefix a candidate must start with: the base path up to and including its last `/`. */
function containerPath(pathname: string): string {
  return pathname.slice(0, pathname.lastIndexOf('/') + 1);
}

/**
 * Check whether `candidate` lies inside the crawl origin defined by `base`.
 *
 * Scheme, host and port must match exactly, and the candidate's path must sit
 * under the base's directory: `http://a.test/docs/index.html` admits
 * `http://a.test/docs/guide` but not `http://a.test/blog`. Query strings and
 * fragments play no part. Path comparison is case-sensitive.
 *
 * Both arguments must be absolute, already resolved URLs.
 */
export function isInOrigin(base: URL, candidate: URL): boolean {
  if (candidate.protocol !== base.protocol) return false;
  if (candidate.hostname !== base.hostname) return false;
  if (candidate.port !== base.port) return false;
  return candidate.pathname.startsWith(containerPath(base.pathname));
}
