import { describe, it, expect, vi } from 'vitest';
import type { HttpClient, HttpResponse } from '@efaktur/contracts';
import {
  CancelledError,
  ConfigurationError,
  HttpError,
  MalformedResponseError,
  NetworkError,
} from '@efaktur/shared';
import { createAuthorityFetcher, createFixtureRecordFetcher } from './fetch-record.js';

const LOOKUP_URL = 'https://efaktur.example.test/validasi/faktur/abc';

function fakeResponse(
  body: string,
  init: { status?: number; statusText?: string; headers?: Record<string, string> } = {},
): HttpResponse {
  const status = init.status ?? 200;
  const bytes = new TextEncoder().encode(body);
  const headers = new Map(
    Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value]),
  );
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: init.statusText ?? 'OK',
    headers: { get: (name: string) => headers.get(name.toLowerCase()) ?? null },
    arrayBuffer: () => {
      const buffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(buffer).set(bytes);
      return Promise.resolve(buffer);
    },
  };
}

function clientReturning(response: HttpResponse) {
  const get = vi.fn((_url: string, _options?: { headers?: Record<string, string>; signal?: AbortSignal }) =>
    Promise.resolve(response),
  );
  const httpClient: HttpClient = { get };
  return { httpClient, get };
}

/** A client that answers each URL from a table */
function routingClient(routes: Record<string, HttpResponse>) {
  const get = vi.fn((url: string, _options?: { headers?: Record<string, string>; signal?: AbortSignal }) => {
    const response = routes[url];
    return response === undefined ? Promise.reject(new TypeError(`no route for ${url}`)) : Promise.resolve(response);
  });
  const httpClient: HttpClient = { get };
  return { httpClient, get };
}

/** A client that only settles when its signal aborts */
const hangingClient: HttpClient = {
  get: (_url, options) =>
    new Promise<HttpResponse>((_resolve, reject) => {
      options?.signal?.addEventListener('abort', () => {
        reject(new Error('The operation was aborted'));
      });
    }),
};

describe('createAuthorityFetcher', () => {
  it('should return the response body', async () => {
    const { httpClient, get } = clientReturning(fakeResponse('<resValidateFakturPm/>'));
    const fetcher = createAuthorityFetcher({ httpClient });

    const body = await fetcher.fetch(LOOKUP_URL);

    expect(new TextDecoder().decode(body)).toBe('<resValidateFakturPm/>');
    expect(get).toHaveBeenCalledWith(
      LOOKUP_URL,
      expect.objectContaining({
        headers: { Accept: 'application/xml, text/xml;q=0.9, */*;q=0.1' },
      }),
    );
  });

  it('should raise HttpError for non-2xx responses', async () => {
    const fetcher = createAuthorityFetcher({
      httpClient: clientReturning(fakeResponse('', { status: 503, statusText: 'Service Unavailable' }))
        .httpClient,
    });

    const error: unknown = await fetcher.fetch(LOOKUP_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(503);
      expect(error.message).toBe('Authority responded with HTTP 503 Service Unavailable');
    }
  });

  it('should follow a redirect to an allowed host', async () => {
    const { httpClient, get } = routingClient({
      [LOOKUP_URL]: fakeResponse('', {
        status: 302,
        statusText: 'Found',
        headers: { Location: '/validasi/faktur/def' },
      }),
      'https://efaktur.example.test/validasi/faktur/def': fakeResponse('<resValidateFakturPm/>'),
    });
    const fetcher = createAuthorityFetcher({ httpClient, allowedHosts: ['efaktur.example.test'] });

    const body = await fetcher.fetch(LOOKUP_URL);

    expect(new TextDecoder().decode(body)).toBe('<resValidateFakturPm/>');
    expect(get.mock.calls.map(([url]) => url)).toEqual([
      LOOKUP_URL,
      'https://efaktur.example.test/validasi/faktur/def',
    ]);
  });

  it('should refuse a redirect to a host outside the allow-list', async () => {
    const { httpClient, get } = routingClient({
      [LOOKUP_URL]: fakeResponse('', {
        status: 302,
        statusText: 'Found',
        headers: { location: 'http://169.254.169.254/latest/meta-data' },
      }),
    });
    const fetcher = createAuthorityFetcher({ httpClient, allowedHosts: ['efaktur.example.test'] });

    const error: unknown = await fetcher.fetch(LOOKUP_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedResponseError);
    if (error instanceof MalformedResponseError) {
      expect(error.message).toBe('Authority redirected to a host that is not allowed');
      expect(error.context).toEqual({ host: 'efaktur.example.test', redirectHost: '169.254.169.254' });
    }
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('should refuse a redirect to another protocol', async () => {
    const fetcher = createAuthorityFetcher({
      httpClient: clientReturning(
        fakeResponse('', { status: 301, statusText: 'Moved', headers: { location: 'file:///etc/passwd' } }),
      ).httpClient,
    });

    await expect(fetcher.fetch(LOOKUP_URL)).rejects.toThrow('Authority redirected to a host that is not allowed');
  });

  it('should stop after too many redirects', async () => {
    const { httpClient, get } = clientReturning(
      fakeResponse('', { status: 307, statusText: 'Temporary Redirect', headers: { location: LOOKUP_URL } }),
    );
    const fetcher = createAuthorityFetcher({ httpClient, maxRedirects: 2 });

    await expect(fetcher.fetch(LOOKUP_URL)).rejects.toThrow('Authority redirected too many times');
    expect(get).toHaveBeenCalledTimes(3);
  });

  it('should raise HttpError for a redirect without a location', async () => {
    const fetcher = createAuthorityFetcher({
      httpClient: clientReturning(fakeResponse('', { status: 302, statusText: 'Found' })).httpClient,
    });

    const error: unknown = await fetcher.fetch(LOOKUP_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(302);
    }
  });

  it('should raise a timeout NetworkError when the authority is slow', async () => {
    const fetcher = createAuthorityFetcher({ httpClient: hangingClient, timeoutMs: 20 });

    const error: unknown = await fetcher.fetch(LOOKUP_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('Authority did not respond within 20 ms');
    }
  });

  it('should raise a connection NetworkError when the transport fails', async () => {
    const fetcher = createAuthorityFetcher({
      httpClient: { get: () => Promise.reject(new TypeError('fetch failed')) },
    });

    const error: unknown = await fetcher.fetch(LOOKUP_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.reason).toBe('connection');
      expect(error.message).toBe('Authority request failed: fetch failed');
    }
  });

  it('should raise CancelledError when the caller aborts', async () => {
    const fetcher = createAuthorityFetcher({ httpClient: hangingClient, timeoutMs: 5_000 });
    const controller = new AbortController();

    const pending = fetcher.fetch(LOOKUP_URL, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should not call the transport when already cancelled', async () => {
    const { httpClient, get } = clientReturning(fakeResponse(''));
    const fetcher = createAuthorityFetcher({ httpClient });

    await expect(fetcher.fetch(LOOKUP_URL, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(get).not.toHaveBeenCalled();
  });

  it('should reject oversized responses', async () => {
    const declared = createAuthorityFetcher({
      httpClient: clientReturning(fakeResponse('<a/>', { headers: { 'Content-Length': '4096' } })).httpClient,
      maxResponseBytes: 1024,
    });
    await expect(declared.fetch(LOOKUP_URL)).rejects.toBeInstanceOf(MalformedResponseError);

    const undeclared = createAuthorityFetcher({
      httpClient: clientReturning(fakeResponse('x'.repeat(2048))).httpClient,
      maxResponseBytes: 1024,
    });
    await expect(undeclared.fetch(LOOKUP_URL)).rejects.toThrow('Authority response exceeds the size limit');
  });

  it('should refuse a timeout that is not finite', () => {
    expect(() =>
      createAuthorityFetcher({ httpClient: hangingClient, timeoutMs: Number.POSITIVE_INFINITY }),
    ).toThrow(ConfigurationError);
  });
});

describe('createFixtureRecordFetcher', () => {
  it('should serve the same payload for any URL', async () => {
    const fetcher = createFixtureRecordFetcher('<resValidateFakturPm/>');

    const first = await fetcher.fetch(LOOKUP_URL);
    const second = await fetcher.fetch('https://other.example.test/');

    expect(new TextDecoder().decode(first)).toBe('<resValidateFakturPm/>');
    expect(second).toEqual(first);
  });

  it('should honour cancellation', async () => {
    const fetcher = createFixtureRecordFetcher('<resValidateFakturPm/>');
    await expect(fetcher.fetch(LOOKUP_URL, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});
