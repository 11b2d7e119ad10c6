/**
 * Shared httpcloak client used as the crawl transport.
 * One session per timeout is kept for the whole run.
 */
import httpcloak from 'httpcloak';
import { STATUS_CODES } from 'node:http';
import { logger } from '../logger.js';
import { hasOwn, setOwn } from '../utils.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './constants.js';
import type { FetchFailure, FetchOutcome, FetchRequestOptions } from './types.js';

/** Session cache keyed by request timeout */
const sessionCache = new Map<number, Promise<httpcloak.Session>>();

/** Sent with every request; the crawler keeps no cache of its own. */
const REQUEST_HEADERS: Record<string, string> = { 'Cache-Control': 'no-cache' };

/** TLS fingerprint preset */
const PRESET = httpcloak.Preset.CHROME_143;

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms for ${url}`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Get or create the httpcloak session for a timeout.
 * A constructor failure is not cached, so the next call retries creation.
 */
export async function getSession(
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): Promise<httpcloak.Session> {
  const cached = sessionCache.get(timeoutMs);
  if (cached) return cached;

  try {
    logger.debug({ preset: PRESET, timeoutMs }, 'Creating httpcloak session');
    const session = new httpcloak.Session({
      preset: PRESET,
      // httpcloak takes whole seconds; the racing timer below enforces the exact value
      timeout: Math.max(1, Math.ceil(timeoutMs / 1000)),
    });
    sessionCache.set(timeoutMs, Promise.resolve(session));
    return session;
  } catch (error) {
    logger.error({ preset: PRESET, error: String(error) }, 'Failed to create httpcloak session');
    throw error;
  }
}

/**
 * Close and forget the session for a timeout. A request abandoned by the
 * racing timer dies with its session, so the next request never overlaps it.
 */
async function discardSession(timeoutMs: number): Promise<void> {
  const pending = sessionCache.get(timeoutMs);
  if (!pending) return;
  sessionCache.delete(timeoutMs);

  try {
    const session = await pending;
    session.close();
  } catch (error) {
    logger.warn({ error: String(error) }, 'Error closing httpcloak session');
  }
}

/**
 * Close all httpcloak sessions.
 * Call this once the crawl has finished.
 */
export async function closeAllSessions(): Promise<void> {
  for (const timeoutMs of Array.from(sessionCache.keys())) {
    await discardSession(timeoutMs);
  }
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout | undefined;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new RequestTimeoutError(url, timeoutMs)), timeoutMs);
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

/**
 * Flatten a response header object: names lower-cased, array values
 * space-joined. Entries that are neither strings nor string arrays are dropped.
 */
export function normalizeHeaders(raw: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!raw || typeof raw !== 'object') return headers;

  for (const [name, value] of Object.entries(raw)) {
    const key = name.toLowerCase();
    let joined: string | undefined;
    if (typeof value === 'string') {
      joined = value;
    } else if (Array.isArray(value)) {
      joined = value.filter((v): v is string => typeof v === 'string').join(' ');
    }
    if (joined === undefined) continue;
    setOwn(headers, key, hasOwn(headers, key) ? `${headers[key]} ${joined}` : joined);
  }

  return headers;
}

/** Read the response body; httpcloak exposes `text` as a property or a function depending on version. */
function readBody(text: unknown): string {
  if (typeof text === 'function') return String(text());
  return typeof text === 'string' ? text : '';
}

/** Standard reason phrase for a status code, empty for unknown codes. */
export function statusText(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? '';
}

/** Fold any thrown transport error into a failed outcome. */
export function toFetchFailure(error: unknown): FetchFailure {
  const timedOut = error instanceof RequestTimeoutError || /time(d)?\s?out/i.test(String(error));
  return {
    success: false,
    error: timedOut ? 'timeout' : 'network_error',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Make a single HTTP GET request.
 * Every HTTP status is returned as a success; only transport errors
 * (timeout, DNS, connection reset, session failure) become failures.
 */
export async function httpRequest(
  url: string,
  options: FetchRequestOptions = {}
): Promise<FetchOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const timeout = createRequestTimeout(url, timeoutMs);

  try {
    const session = await getSession(timeoutMs);
    logger.debug({ url, timeoutMs }, 'Making httpcloak request');

    const response = await Promise.race([
      session.get(url, { headers: REQUEST_HEADERS }),
      timeout.promise,
    ]);
    const body = readBody(response.text);

    logger.debug(
      { url, statusCode: response.statusCode, bodyLength: body.length },
      'httpcloak request complete'
    );

    return {
      success: true,
      statusCode: response.statusCode,
      statusText: statusText(response.statusCode),
      headers: normalizeHeaders(response.headers),
      body,
    };
  } catch (error) {
    logger.warn({ url, error: String(error) }, 'httpcloak request failed');
    if (error instanceof RequestTimeoutError) await discardSession(timeoutMs);
    return toFetchFailure(error);
  } finally {
    timeout.cancel();
  }
}
