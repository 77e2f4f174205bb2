/**
 * HTTP client tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
  isTransportError,
} from '../../../core/http-client.js';

const URL_UNDER_TEST = 'https://example.test/data';

function client(timeoutMs = 1000): HTTPClient {
  return new HTTPClient({ initialDelayMs: 0, jitterFactor: 0, timeoutMs });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (next === undefined) throw new Error('unexpected request');
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HTTPClient', () => {
  it('validates JSON bodies against a schema', async () => {
    const fetchMock = stubFetch(new Response(JSON.stringify({ sha: 'abc123' }), { status: 200 }));

    const body = await client().fetchJSON(URL_UNDER_TEST, z.object({ sha: z.string() }));

    expect(body).toEqual({ sha: 'abc123' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
      Accept: 'application/json',
      'User-Agent': 'election-feed-validator/0.1',
    });
  });

  it('rejects JSON of the wrong shape', async () => {
    stubFetch(new Response(JSON.stringify({ sha: 42 }), { status: 200 }));

    await expect(client().fetchJSON(URL_UNDER_TEST, z.object({ sha: z.string() }))).rejects.toBeInstanceOf(
      HTTPJSONParseError
    );
  });

  it('does not retry a 404', async () => {
    const fetchMock = stubFetch(new Response('missing', { status: 404 }));

    await expect(client().fetchText(URL_UNDER_TEST)).rejects.toMatchObject({ name: 'HTTPError', statusCode: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries retryable statuses until one succeeds', async () => {
    const fetchMock = stubFetch(new Response('busy', { status: 503 }), new Response('id,name\n', { status: 200 }));

    expect(await client().fetchText(URL_UNDER_TEST)).toBe('id,name\n');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured retries', async () => {
    const fetchMock = stubFetch(
      new Response('busy', { status: 503 }),
      new Response('busy', { status: 503 }),
      new Response('busy', { status: 503 })
    );

    await expect(client().fetchText(URL_UNDER_TEST, { retries: 2 })).rejects.toBeInstanceOf(HTTPError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('wraps connection failures as transport errors', async () => {
    stubFetch(new TypeError('fetch failed'), new TypeError('fetch failed'));

    const failure = await client()
      .fetchText(URL_UNDER_TEST, { retries: 1 })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HTTPNetworkError);
    expect(failure).toMatchObject({ message: 'Network error: fetch failed' });
    expect(isTransportError(failure)).toBe(true);
  });

  it('times out a request that never answers', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
          })
      )
    );

    const failure = await client(10)
      .fetchText(URL_UNDER_TEST, { retries: 0 })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HTTPTimeoutError);
    expect(isTransportError(failure)).toBe(true);
  });

  it('times out a body that stops arriving after the headers', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('id,name\n'));
      },
    });
    const fetchMock = stubFetch(new Response(stalled, { status: 200 }));

    const failure = await client(10)
      .fetchText(URL_UNDER_TEST, { retries: 0 })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HTTPTimeoutError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not treat HTTP errors as transport errors', () => {
    expect(isTransportError(new HTTPError('HTTP 404: Not Found', 404, URL_UNDER_TEST))).toBe(false);
  });
});
