import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { fetchWithRetry, getRetryDelay } from './fetchWithRetry.js';

describe('getRetryDelay', () => {
  it('honours a numeric Retry-After header', () => {
    expect(getRetryDelay(0, '2')).toBe(2000);
  });

  it('caps Retry-After at thirty seconds', () => {
    expect(getRetryDelay(0, '120')).toBe(30_000);
  });

  it('backs off exponentially within the jitter band', () => {
    for (let attempt = 0; attempt < 4; attempt++) {
      const delay = getRetryDelay(attempt, null, 100);
      const base = 100 * 2 ** attempt;
      expect(delay).toBeGreaterThanOrEqual(base * 0.8);
      expect(delay).toBeLessThanOrEqual(base * 1.2);
    }
  });

  it('ignores an unparseable Retry-After header', () => {
    expect(getRetryDelay(0, 'soon', 0)).toBe(0);
  });
});

describe('fetchWithRetry', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('returns the first non-retryable response', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad request', { status: 400 }));
    const response = await fetchWithRetry('https://api.example.test/x', undefined, { baseDelayMs: 0 });
    expect(response.status).toBe(400);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the retry budget and returns the last response', async () => {
    fetchMock.mockImplementation(async () => new Response('busy', { status: 502 }));
    const response = await fetchWithRetry('https://api.example.test/x', undefined, { maxRetries: 2, baseDelayMs: 0 });
    expect(response.status).toBe(502);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('stops waiting when the request is aborted during backoff', async () => {
    fetchMock.mockImplementation(async () => new Response('busy', { status: 503, headers: { 'Retry-After': '10' } }));
    const controller = new AbortController();
    const pending = fetchWithRetry('https://api.example.test/x', { signal: controller.signal });
    setTimeout(() => controller.abort(new Error('stop')), 5);

    await expect(pending).rejects.toThrow('stop');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
