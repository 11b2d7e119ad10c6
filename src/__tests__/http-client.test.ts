import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockGet = vi.fn();
const mockClose = vi.fn();
let mockSessionConstructor: (() => void) | undefined;
const mockSessionOptions: Record<string, unknown>[] = [];

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('httpcloak', () => ({
  default: {
    Session: class MockSession {
      get = mockGet;
      close = mockClose;
      constructor(opts?: Record<string, unknown>) {
        mockSessionOptions.push(opts ?? {});
        if (mockSessionConstructor) mockSessionConstructor();
      }
    },
    Preset: {
      CHROME_143: 'chrome_143',
    },
  },
}));

import {
  closeAllSessions,
  getSession,
  httpRequest,
  normalizeHeaders,
  statusText,
  toFetchFailure,
  RequestTimeoutError,
} from '../fetch/http-client.js';

beforeEach(() => {
  mockGet.mockReset();
  mockClose.mockReset();
  mockSessionOptions.length = 0;
});

afterEach(async () => {
  mockSessionConstructor = undefined;
  vi.useRealTimers();
  await closeAllSessions();
});

describe('http-client', () => {
  describe('getSession', () => {
    it('returns the cached session on a second call', async () => {
      const session1 = await getSession();
      const session2 = await getSession();
      expect(session1).toBe(session2);
      expect(mockSessionOptions).toEqual([{ preset: 'chrome_143', timeout: 10 }]);
    });

    it('creates one session per timeout, rounded up to whole seconds', async () => {
      await getSession(2500);
      await getSession(300);
      expect(mockSessionOptions).toEqual([
        { preset: 'chrome_143', timeout: 3 },
        { preset: 'chrome_143', timeout: 1 },
      ]);
    });

    it('recovers after session creation fails', async () => {
      mockSessionConstructor = () => {
        throw new Error('Binary not found');
      };
      await expect(getSession()).rejects.toThrow('Binary not found');

      mockSessionConstructor = undefined;
      const session = await getSession();
      expect(session.get).toBeDefined();
    });
  });

  describe('closeAllSessions', () => {
    it('closes sessions and clears the cache', async () => {
      const session1 = await getSession();
      await closeAllSessions();
      const session2 = await getSession();

      expect(mockClose).toHaveBeenCalledTimes(1);
      expect(session1).not.toBe(session2);
    });
  });

  describe('httpRequest', () => {
    it('returns status, reason phrase, normalized headers and body', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: '<html>Hello</html>',
        headers: { 'Content-Type': 'text/html', 'Set-Cookie': ['a=1', 'b=2'] },
      });

      const result = await httpRequest('https://example.test/page');

      expect(result).toEqual({
        success: true,
        statusCode: 200,
        statusText: 'OK',
        headers: { 'content-type': 'text/html', 'set-cookie': 'a=1 b=2' },
        body: '<html>Hello</html>',
      });
      expect(mockGet).toHaveBeenCalledWith('https://example.test/page', {
        headers: { 'Cache-Control': 'no-cache' },
      });
    });

    it('treats error statuses as completed requests', async () => {
      mockGet.mockResolvedValue({ ok: false, statusCode: 503, text: '', headers: {} });

      const result = await httpRequest('https://example.test/down');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.statusCode).toBe(503);
        expect(result.statusText).toBe('Service Unavailable');
      }
    });

    it('handles the text-as-function quirk', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: () => '<html>Function text</html>',
        headers: {},
      });

      const result = await httpRequest('https://example.test/page');

      expect(result.success && result.body).toBe('<html>Function text</html>');
    });

    it('returns a network_error failure when the request rejects', async () => {
      mockGet.mockRejectedValue(new Error('Connection refused'));

      const result = await httpRequest('https://example.test/page');

      expect(result).toEqual({
        success: false,
        error: 'network_error',
        message: 'Connection refused',
      });
    });

    it('returns a timeout failure when the request outlives the timeout', async () => {
      vi.useFakeTimers();
      mockGet.mockReturnValue(new Promise(() => {}));

      const pending = httpRequest('https://example.test/slow', { timeoutMs: 50 });
      await vi.advanceTimersByTimeAsync(50);

      expect(await pending).toEqual({
        success: false,
        error: 'timeout',
        message: 'Request timeout after 50ms for https://example.test/slow',
      });
    });

    it('closes the session of a timed-out request so the next request starts fresh', async () => {
      vi.useFakeTimers();
      mockGet.mockReturnValue(new Promise(() => {}));

      const pending = httpRequest('https://example.test/slow', { timeoutMs: 50 });
      await vi.advanceTimersByTimeAsync(50);
      await pending;

      expect(mockClose).toHaveBeenCalledTimes(1);

      mockGet.mockResolvedValue({ statusCode: 200, text: '', headers: {} });
      const next = await httpRequest('https://example.test/next', { timeoutMs: 50 });

      expect(next.success).toBe(true);
      expect(mockSessionOptions).toEqual([
        { preset: 'chrome_143', timeout: 1 },
        { preset: 'chrome_143', timeout: 1 },
      ]);
    });

    it('keeps the session after a request that completes', async () => {
      mockGet.mockResolvedValue({ statusCode: 200, text: '', headers: {} });

      await httpRequest('https://example.test/a');
      await httpRequest('https://example.test/b');

      expect(mockClose).not.toHaveBeenCalled();
      expect(mockSessionOptions).toHaveLength(1);
    });

    it('returns a failure when the session cannot be created', async () => {
      mockSessionConstructor = () => {
        throw new Error('Binary not found');
      };

      const result = await httpRequest('https://example.test/page');

      expect(result).toEqual({ success: false, error: 'network_error', message: 'Binary not found' });
    });
  });

  describe('normalizeHeaders', () => {
    it('lower-cases names and joins multi-valued headers with spaces', () => {
      expect(normalizeHeaders({ Vary: ['Accept', 'Origin'], Server: 'nginx' })).toEqual({
        vary: 'Accept Origin',
        server: 'nginx',
      });
    });

    it('merges names that differ only by case', () => {
      expect(normalizeHeaders({ 'X-Tag': 'a', 'x-tag': 'b' })).toEqual({ 'x-tag': 'a b' });
    });

    it('keeps a header named __proto__ as an ordinary entry', () => {
      const raw: unknown = JSON.parse('{"__proto__":"x","Server":"nginx"}');

      expect(Object.entries(normalizeHeaders(raw))).toEqual([
        ['__proto__', 'x'],
        ['server', 'nginx'],
      ]);
    });

    it('drops non-string values and tolerates missing header objects', () => {
      expect(normalizeHeaders({ 'content-length': 42, server: 'x' })).toEqual({ server: 'x' });
      expect(normalizeHeaders(undefined)).toEqual({});
    });
  });

  describe('statusText', () => {
    it('maps known codes to reason phrases and unknown codes to empty strings', () => {
      expect(statusText(404)).toBe('Not Found');
      expect(statusText(299)).toBe('');
    });
  });

  describe('toFetchFailure', () => {
    it('classifies timeouts by type or message', () => {
      expect(toFetchFailure(new RequestTimeoutError('https://example.test/', 10)).error).toBe(
        'timeout'
      );
      expect(toFetchFailure(new Error('context deadline exceeded (Client.Timeout)')).error).toBe(
        'timeout'
      );
      expect(toFetchFailure('ECONNRESET')).toEqual({
        success: false,
        error: 'network_error',
        message: 'ECONNRESET',
      });
    });
  });
});
