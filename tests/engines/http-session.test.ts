import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpSession, HttpSessionError } from '../../src/engines/http-session.js';

describe('HttpSession', () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.useRealTimers();
  });

  function mockFetch(status: number, body: string, headers: Record<string, string> = {}) {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: status >= 200 && status < 300,
      status,
      statusText: status === 200 ? 'OK' : 'Error',
      url: 'https://example.com/',
      headers: new Headers(headers),
      text: () => Promise.resolve(body),
    });
    globalThis.fetch = fetchMock;
    return fetchMock;
  }

  it('sends default headers with every request', async () => {
    const fetchMock = mockFetch(200, '<html></html>');
    const session = new HttpSession({ userAgent: 'test-agent/1.0' });

    await session.get('https://example.com');

    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com',
      expect.objectContaining({
        method: 'GET',
        redirect: 'follow',
        headers: expect.objectContaining({
          'User-Agent': 'test-agent/1.0',
          Accept: 'text/html,application/xhtml+xml,application/xml',
          'Accept-Language': 'en-US,en;q=0.5',
        }),
      }),
    );
  });

  it('lets explicit headers override the defaults', async () => {
    const fetchMock = mockFetch(200, '');
    const session = new HttpSession({ headers: { Accept: 'text/plain' } });

    await session.options('https://example.com');

    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com',
      expect.objectContaining({
        method: 'OPTIONS',
        headers: expect.objectContaining({ Accept: 'text/plain', 'User-Agent': 'HTML-QA/0.1' }),
      }),
    );
  });

  it('returns status, lower-cased headers and body of a GET', async () => {
    mockFetch(200, '<!doctype html><html></html>', { 'Content-Type': 'text/html; charset=utf-8' });
    const session = new HttpSession();

    const response = await session.get('https://example.com');

    expect(response).toEqual({
      ok: true,
      status: 200,
      statusText: 'OK',
      url: 'https://example.com/',
      headers: { 'content-type': 'text/html; charset=utf-8' },
      text: '<!doctype html><html></html>',
    });
  });

  it('does not read the body of an OPTIONS response', async () => {
    mockFetch(204, 'ignored');
    const response = await new HttpSession().options('https://example.com');

    expect(response.text).toBe('');
    expect(response.ok).toBe(true);
  });

  it('returns non-2xx responses instead of throwing', async () => {
    mockFetch(503, 'unavailable');
    const response = await new HttpSession().get('https://example.com');

    expect(response.ok).toBe(false);
    expect(response.status).toBe(503);
  });

  it('wraps transport errors in HttpSessionError', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const session = new HttpSession();

    await expect(session.get('https://unreachable.test')).rejects.toThrow(HttpSessionError);
    await expect(session.get('https://unreachable.test')).rejects.toMatchObject({
      message: 'fetch failed',
      url: 'https://unreachable.test',
    });
  });

  it('reports a timeout when the request is aborted', async () => {
    globalThis.fetch = vi.fn().mockImplementation(
      (_url: string, init: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => {
            const error = new Error('This operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        }),
    );
    const session = new HttpSession({ defaultTimeoutMs: 10 });

    await expect(session.get('https://slow.test')).rejects.toThrow('Request timed out after 10ms');
  });
});
