/**
 * HTTP Client Tests
 *
 * Retry classification with a stubbed fetch and zero backoff.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPRetryExhaustedError,
  backoffDelay,
  isFeatureCollection,
  parseRetryAfter,
  type RetryPolicy,
} from '../../../core/http-client.js';
import { jsonResponse } from '../../utils/index.js';

function createClient(maxRetries: number): HTTPClient {
  return new HTTPClient({ maxRetries, initialDelayMs: 0, jitterFactor: 0 });
}

describe('HTTPClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('retries retryable statuses until success', async () => {
    const fetchMock = vi
      .fn(async (_url: string, _init: RequestInit) => jsonResponse({ ok: true }))
      .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503));
    vi.stubGlobal('fetch', fetchMock);

    const data = await createClient(2).getJSON('https://api.test/items');

    expect(data).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('fails fast on client errors', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({}, 404));
    vi.stubGlobal('fetch', fetchMock);

    await expect(createClient(3).getJSON('https://api.test/missing')).rejects.toBeInstanceOf(HTTPError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up with the last failure once the retry budget is spent', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ error: 'busy' }, 503));
    vi.stubGlobal('fetch', fetchMock);

    const error: unknown = await createClient(2)
      .getJSON('https://api.test/busy')
      .catch((reason: unknown) => reason);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(HTTPRetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, url: 'https://api.test/busy' });
    expect(error).toHaveProperty('lastError.statusCode', 503);
  });

  it('wraps network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const error: unknown = await createClient(0)
      .getJSON('https://api.test/down')
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(HTTPRetryExhaustedError);
    expect(error).toHaveProperty('attempts', 1);
    expect(error).toHaveProperty('lastError.message', 'Network error: fetch failed');
    expect(error instanceof HTTPRetryExhaustedError && error.lastError).toBeInstanceOf(HTTPNetworkError);
  });

  it('waits the server-requested delay instead of the computed backoff', async () => {
    const fetchMock = vi
      .fn(async (_url: string, _init: RequestInit) => jsonResponse({ ok: true }))
      .mockResolvedValueOnce(new Response('{}', { status: 429, headers: { 'Retry-After': '0' } }));
    vi.stubGlobal('fetch', fetchMock);
    // A one-minute backoff would outlast the test timeout
    const client = new HTTPClient({ maxRetries: 1, initialDelayMs: 60_000, jitterFactor: 0 });

    const data = await client.getJSON('https://api.test/limited');

    expect(data).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('stops waiting between attempts when the caller aborts', async () => {
    const controller = new AbortController();
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
      controller.abort();
      return jsonResponse({ error: 'busy' }, 503);
    });
    vi.stubGlobal('fetch', fetchMock);
    const client = new HTTPClient({ maxRetries: 3, initialDelayMs: 60_000, jitterFactor: 0 });

    await expect(client.getJSON('https://api.test/items', { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports unparseable bodies', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('<html>', { status: 200 }))
    );

    await expect(createClient(0).getJSON('https://api.test/html')).rejects.toBeInstanceOf(HTTPJSONParseError);
  });

  it('sends JSON bodies with POST', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ done: true }));
    vi.stubGlobal('fetch', fetchMock);

    await createClient(0).postJSON('https://api.test/chat', { q: 1 });

    const init = fetchMock.mock.calls[0][1];
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"q":1}');
    expect(init.headers).toMatchObject({ 'Content-Type': 'application/json' });
  });

  it('rejects responses that are not feature collections', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ type: 'Feature' }))
    );

    await expect(createClient(0).getFeatureCollection('https://api.test/geo')).rejects.toThrow(
      'Invalid GeoJSON response: expected FeatureCollection, got Feature'
    );
  });
});

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('120')).toBe(120_000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30_000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('ignores a missing or unreadable header', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });
});

describe('backoffDelay', () => {
  const policy: RetryPolicy = {
    maxRetries: 3,
    initialDelayMs: 1000,
    backoffMultiplier: 2,
    maxDelayMs: 5000,
    jitterFactor: 0.1,
  };

  it('grows geometrically up to the cap', () => {
    const centered = (): number => 0.5;

    expect(backoffDelay(policy, 1, centered)).toBe(1000);
    expect(backoffDelay(policy, 3, centered)).toBe(4000);
    expect(backoffDelay(policy, 4, centered)).toBe(5000);
  });

  it('spreads each delay by the jitter factor', () => {
    expect(backoffDelay(policy, 1, () => 0)).toBe(900);
    expect(backoffDelay(policy, 1, () => 1)).toBe(1100);
  });
});

describe('isFeatureCollection', () => {
  it('requires the type tag and a features array', () => {
    expect(isFeatureCollection({ type: 'FeatureCollection', features: [] })).toBe(true);
    expect(isFeatureCollection({ type: 'FeatureCollection' })).toBe(false);
    expect(isFeatureCollection(null)).toBe(false);
  });
});
