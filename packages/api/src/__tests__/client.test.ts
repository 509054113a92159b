/**
 * Fetch executor unit tests
 * Tests retry policy, failure classification, timeouts and URL building
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ApiClient } from '../client';
import { FetchFailure, MAX_BODY_CHARS, redactUrl } from '../errors';
import { calledHeaders, calledUrl, jsonResponse, queueFetch } from '../test/fetch';

const schema = z.object({ value: z.number() });

function createClient(fetchMock: ReturnType<typeof queueFetch>, overrides: { timeout?: number; rateLimitCooldownMs?: number } = {}) {
  return new ApiClient({
    baseUrl: 'https://api.example.com/',
    fetch: fetchMock,
    rateLimitCooldownMs: 0,
    ...overrides,
  });
}

function expectFailure<T>(result: { ok: true; data: T } | { ok: false; failure: FetchFailure }): FetchFailure {
  if (result.ok) {
    throw new Error('expected a failure');
  }
  return result.failure;
}

describe('ApiClient.request', () => {
  it('returns parsed data on success', async () => {
    const fetchMock = queueFetch(jsonResponse({ value: 42 }));
    const client = createClient(fetchMock);

    const result = await client.get('/v1/thing', {}, schema);

    expect(result).toEqual({ ok: true, data: { value: 42 }, retried: false });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries exactly once after a 429 and returns the second response', async () => {
    const fetchMock = queueFetch(jsonResponse({ error: 'slow down' }, 429), jsonResponse({ value: 7 }));
    const client = createClient(fetchMock);

    const result = await client.get('/v1/thing', {}, schema);

    expect(result).toEqual({ ok: true, data: { value: 7 }, retried: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports rate_limited after two consecutive 429s', async () => {
    const fetchMock = queueFetch(jsonResponse({}, 429), jsonResponse({}, 429), jsonResponse({ value: 1 }));
    const client = createClient(fetchMock);

    const failure = expectFailure(await client.get('/v1/thing', {}, schema));

    expect(failure).toBeInstanceOf(FetchFailure);
    expect(failure.kind).toBe('rate_limited');
    expect(failure.status).toBe(429);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports http for a non-success status without retrying, with a truncated body', async () => {
    const longBody = 'x'.repeat(300);
    const fetchMock = queueFetch(new Response(longBody, { status: 500, statusText: 'Internal Server Error' }));
    const client = createClient(fetchMock);

    const failure = expectFailure(await client.get('/v1/thing', {}, schema));

    expect(failure.kind).toBe('http');
    expect(failure.status).toBe(500);
    expect(failure.body).toBe('x'.repeat(MAX_BODY_CHARS));
    expect(failure.message).toBe('API request failed: 500 Internal Server Error');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports the status of the retry when it is not a 429', async () => {
    const fetchMock = queueFetch(jsonResponse({}, 429), new Response('gone', { status: 503 }));
    const client = createClient(fetchMock);

    const failure = expectFailure(await client.get('/v1/thing', {}, schema));

    expect(failure.kind).toBe('http');
    expect(failure.status).toBe(503);
    expect(failure.body).toBe('gone');
  });

  it('reports transport errors as values', async () => {
    const fetchMock = queueFetch(new TypeError('fetch failed'));
    const client = createClient(fetchMock);

    const failure = expectFailure(await client.get('/v1/thing', {}, schema));

    expect(failure.kind).toBe('transport');
    expect(failure.cause).toBeInstanceOf(TypeError);
  });

  it('reports an unparseable body as malformed', async () => {
    const fetchMock = queueFetch(new Response('<html>not json</html>', { status: 200 }));
    const client = createClient(fetchMock);

    const failure = expectFailure(await client.get('/v1/thing', {}, schema));

    expect(failure.kind).toBe('malformed');
    expect(failure.message).toBe('Malformed response: body is not valid JSON');
    expect(failure.body).toBe('<html>not json</html>');
  });

  it('reports a body that fails the schema as malformed', async () => {
    const fetchMock = queueFetch(jsonResponse({ value: 'not a number' }));
    const client = createClient(fetchMock);

    const failure = expectFailure(await client.get('/v1/thing', {}, schema));

    expect(failure.kind).toBe('malformed');
    expect(failure.status).toBe(200);
    expect(failure.message).toContain('value: ');
  });

  it('aborts a request that exceeds the timeout', async () => {
    const fetchMock = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new ApiClient({ baseUrl: 'https://api.example.com', fetch: fetchMock, timeout: 10 });

    const failure = expectFailure(await client.get('/v1/slow', {}, schema));

    expect(failure.kind).toBe('timeout');
    expect(failure.message).toBe('Request timeout after 10ms');
  });

  it('waits the cooldown before retrying', async () => {
    const fetchMock = queueFetch(jsonResponse({}, 429), jsonResponse({ value: 1 }));
    const client = createClient(fetchMock, { rateLimitCooldownMs: 20 });

    const started = Date.now();
    const result = await client.get('/v1/thing', {}, schema);

    expect(result.ok).toBe(true);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it('redacts credentials in failure URLs', async () => {
    const fetchMock = queueFetch(new Response('nope', { status: 401 }));
    const client = createClient(fetchMock);

    const failure = expectFailure(
      await client.get('/v1/posts', { params: { auth_token: 'test-secret', size: 50 } }, schema)
    );

    expect(failure.url).toBe('https://api.example.com/v1/posts?auth_token=****&size=50');
    expect(calledUrl(fetchMock).searchParams.get('auth_token')).toBe('test-secret');
  });

  it('notifies onFailure for every failure', async () => {
    const onFailure = vi.fn();
    const fetchMock = queueFetch(new Response('nope', { status: 404 }));
    const client = new ApiClient({ baseUrl: 'https://api.example.com', fetch: fetchMock, onFailure });

    await client.get('/v1/missing', {}, schema);

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]?.[0]).toBeInstanceOf(FetchFailure);
  });

  it('sends default headers and a JSON body on POST', async () => {
    const fetchMock = queueFetch(jsonResponse({ value: 1 }));
    const client = new ApiClient({
      baseUrl: 'https://api.example.com',
      fetch: fetchMock,
      defaultHeaders: { Authorization: 'Bearer test-secret' },
    });

    await client.post('/graphql', { query: '{ ping }' }, {}, schema);

    const headers = calledHeaders(fetchMock);
    expect(headers.get('authorization')).toBe('Bearer test-secret');
    expect(headers.get('content-type')).toBe('application/json');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"query":"{ ping }"}');
  });
});

describe('ApiClient.buildUrl', () => {
  const client = new ApiClient({ baseUrl: 'https://api.example.com/' });

  it('joins base and path and skips undefined params', () => {
    expect(client.buildUrl('/v1/x', { a: 1, b: undefined, c: true })).toBe('https://api.example.com/v1/x?a=1&c=true');
  });

  it('uses absolute URLs as-is and appends to an existing query', () => {
    expect(client.buildUrl('https://other.example.com/p?page=2', { x: 'y' })).toBe(
      'https://other.example.com/p?page=2&x=y'
    );
  });

  it('adds no query string when there are no params', () => {
    expect(client.buildUrl('/v1/x')).toBe('https://api.example.com/v1/x');
  });
});

describe('redactUrl', () => {
  it('masks credential parameters', () => {
    expect(redactUrl('https://example.com/posts?auth_token=abc&size=50')).toBe(
      'https://example.com/posts?auth_token=****&size=50'
    );
    expect(redactUrl('https://example.com/assets?symbol=BTC&key=abc')).toBe(
      'https://example.com/assets?symbol=BTC&key=****'
    );
  });

  it('leaves unparseable input untouched', () => {
    expect(redactUrl('not a url')).toBe('not a url');
  });
});
