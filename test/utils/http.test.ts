import { describe, it, expect, vi, afterEach } from 'vitest';
import { requestJson } from '../../src/utils/http.js';
import { ExternalServiceError } from '../../src/utils/errors.js';

function stubFetch(response: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('requestJson', () => {
  it('sends a GET with an accept header and parses the JSON answer', async () => {
    const fetchMock = stubFetch(() => new Response('{"status":"ok"}', { status: 200 }));

    const result = await requestJson('http://index.test/health', 'index', { timeoutMs: 1000 });

    expect(result).toEqual({ status: 'ok' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://index.test/health');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ accept: 'application/json' });
    expect(init?.body).toBeUndefined();
  });

  it('serializes a body and merges headers', async () => {
    const fetchMock = stubFetch(() => new Response('{}', { status: 200 }));

    await requestJson('http://index.test/points', 'index', {
      method: 'PUT',
      body: { points: [] },
      headers: { 'api-key': 'test-secret' },
      timeoutMs: 1000,
    });

    const init = fetchMock.mock.calls[0][1];
    expect(init?.body).toBe('{"points":[]}');
    expect(init?.headers).toEqual({
      accept: 'application/json',
      'api-key': 'test-secret',
      'content-type': 'application/json',
    });
  });

  it('returns null for an empty body', async () => {
    stubFetch(() => new Response('', { status: 200 }));

    await expect(requestJson('http://index.test', 'index', { timeoutMs: 1000 })).resolves.toBeNull();
  });

  it('turns a non-2xx answer into an ExternalServiceError', async () => {
    stubFetch(() => new Response('collection missing', { status: 404 }));

    const error = await requestJson('http://index.test', 'index', { timeoutMs: 1000 }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({
      code: 'INDEX_REQUEST_FAILED',
      service: 'index',
      message: 'index service answered 404: collection missing',
    });
  });

  it('rejects invalid JSON', async () => {
    stubFetch(() => new Response('<html>', { status: 200 }));

    await expect(
      requestJson('http://embed.test', 'embedding', { timeoutMs: 1000 }),
    ).rejects.toMatchObject({
      code: 'EMBEDDING_REQUEST_FAILED',
      message: 'embedding service returned invalid JSON',
    });
  });

  it('reports network failures as unreachable', async () => {
    stubFetch(() => Promise.reject(new TypeError('fetch failed')));

    await expect(
      requestJson('http://embed.test', 'embedding', { timeoutMs: 1000 }),
    ).rejects.toMatchObject({
      code: 'EMBEDDING_REQUEST_FAILED',
      message: 'embedding service unreachable: fetch failed',
    });
  });

  it('reports a timeout when the request outlives timeoutMs', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      ),
    );

    await expect(
      requestJson('http://index.test', 'index', { timeoutMs: 20 }),
    ).rejects.toMatchObject({
      code: 'SERVICE_TIMEOUT',
      message: 'index service timed out after 20ms',
    });
  });
});
