/**
 * Authoritative record fetchers
 *
 * The pipeline talks to the tax authority through the {@link RecordFetcher}
 * contract. The HTTP fetcher enforces a finite timeout, links the caller's
 * AbortSignal and follows redirects only to allowed hosts. The fixture
 * fetcher serves a fixed payload for offline runs.
 */

import type { HttpClient, HttpResponse, ProviderCallOptions, RecordFetcher } from '@efaktur/contracts';
import {
  CancelledError,
  ConfigurationError,
  HttpError,
  MalformedResponseError,
  NetworkError,
  createSilentLogger,
  isAllowedLookupHost,
  isEFakturError,
  throwIfCancelled,
  type Logger,
} from '@efaktur/shared';

/** Default authority timeout (10 seconds) */
export const DEFAULT_AUTHORITY_TIMEOUT_MS = 10_000;

/** Default response size limit (1 MiB) */
export const DEFAULT_MAX_RESPONSE_BYTES = 1024 * 1024;

/** Default number of redirects followed per lookup */
export const DEFAULT_MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface AuthorityFetcherConfig {
  /** Transport; pipeline packages never call fetch() directly */
  httpClient: HttpClient;

  /**
   * Upper bound for one request, including the body read
   * @default 10000
   */
  timeoutMs?: number;

  /**
   * Responses larger than this are rejected as malformed
   * @default 1048576
   */
  maxResponseBytes?: number;

  /** Extra request headers */
  headers?: Record<string, string>;

  /**
   * Hosts a redirect may lead to. Empty allows any http(s) host.
   * @default []
   */
  allowedHosts?: readonly string[];

  /**
   * Redirect hops followed before giving up
   * @default 5
   */
  maxRedirects?: number;

  logger?: Logger;
}

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'application/xml, text/xml;q=0.9, */*;q=0.1',
};

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'invalid-url';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create the HTTP-backed fetcher.
 *
 * @throws ConfigurationError when the timeout, size limit or redirect limit is out of range
 */
export function createAuthorityFetcher(config: AuthorityFetcherConfig): RecordFetcher {
  const timeoutMs = config.timeoutMs ?? DEFAULT_AUTHORITY_TIMEOUT_MS;
  const maxResponseBytes = config.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
  const headers = { ...DEFAULT_HEADERS, ...config.headers };
  const logger = config.logger ?? createSilentLogger();
  const allowedHosts = config.allowedHosts ?? [];
  const maxRedirects = config.maxRedirects ?? DEFAULT_MAX_REDIRECTS;

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError('Authority timeout must be a positive finite number', { timeoutMs });
  }
  if (!Number.isFinite(maxResponseBytes) || maxResponseBytes <= 0) {
    throw new ConfigurationError('Authority response limit must be a positive finite number', {
      maxResponseBytes,
    });
  }
  if (!Number.isInteger(maxRedirects) || maxRedirects < 0) {
    throw new ConfigurationError('Authority redirect limit must be a non-negative integer', { maxRedirects });
  }

  const readBody = async (response: HttpResponse, host: string): Promise<Uint8Array> => {
    const declaredLength = response.headers.get('content-length');
    if (declaredLength !== null && Number(declaredLength) > maxResponseBytes) {
      throw new MalformedResponseError('Authority response exceeds the size limit', {
        host,
        maxResponseBytes,
      });
    }

    const body = new Uint8Array(await response.arrayBuffer());
    if (body.byteLength > maxResponseBytes) {
      throw new MalformedResponseError('Authority response exceeds the size limit', {
        host,
        maxResponseBytes,
      });
    }
    return body;
  };

  // Resolve a redirect target, refusing hosts outside the allow-list
  const redirectTarget = (response: HttpResponse, from: string, hops: number): string => {
    const host = hostOf(from);
    if (hops >= maxRedirects) {
      throw new MalformedResponseError('Authority redirected too many times', { host, maxRedirects });
    }
    const location = response.headers.get('location');
    if (location === null) {
      throw new HttpError(response.status, response.statusText, { host });
    }

    let target: URL;
    try {
      target = new URL(location, from);
    } catch (error) {
      throw new MalformedResponseError('Authority redirect has an invalid location', { host }, { cause: error });
    }
    if (
      (target.protocol !== 'http:' && target.protocol !== 'https:') ||
      !isAllowedLookupHost(target, allowedHosts)
    ) {
      throw new MalformedResponseError('Authority redirected to a host that is not allowed', {
        host,
        redirectHost: target.host,
      });
    }
    return target.href;
  };

  return {
    name: 'authority-http',

    async fetch(url: string, options?: ProviderCallOptions): Promise<Uint8Array> {
      const signal = options?.signal;
      throwIfCancelled(signal, 'fetch');

      const host = hostOf(url);
      const startTime = Date.now();
      const controller = new AbortController();
      let timedOut = false;

      const timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
      const onCallerAbort = (): void => {
        controller.abort();
      };
      signal?.addEventListener('abort', onCallerAbort, { once: true });

      logger.debug('Fetching authority record', { host, timeoutMs });

      try {
        let requestUrl = url;
        let response = await config.httpClient.get(requestUrl, { headers, signal: controller.signal });
        for (let hops = 0; REDIRECT_STATUSES.has(response.status); hops++) {
          requestUrl = redirectTarget(response, requestUrl, hops);
          logger.debug('Following authority redirect', { host: hostOf(requestUrl) });
          response = await config.httpClient.get(requestUrl, { headers, signal: controller.signal });
        }

        if (!response.ok) {
          throw new HttpError(response.status, response.statusText, { host });
        }

        const body = await readBody(response, host);
        logger.debug('Authority record received', {
          host,
          status: response.status,
          bytes: body.byteLength,
          durationMs: Date.now() - startTime,
        });
        return body;
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError('fetch', { cause: error });
        }
        if (isEFakturError(error)) {
          throw error;
        }
        if (timedOut) {
          throw new NetworkError(
            `Authority did not respond within ${timeoutMs} ms`,
            'timeout',
            { host, timeoutMs },
            { cause: error },
          );
        }
        throw new NetworkError(
          `Authority request failed: ${describe(error)}`,
          'connection',
          { host },
          { cause: error },
        );
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onCallerAbort);
      }
    },
  };
}

/**
 * Create a fetcher that always returns `payload`, ignoring the URL.
 * Used for offline runs and tests.
 */
export function createFixtureRecordFetcher(
  payload: Uint8Array | string,
  options: { logger?: Logger } = {},
): RecordFetcher {
  const bytes = typeof payload === 'string' ? new TextEncoder().encode(payload) : payload;
  const logger = options.logger ?? createSilentLogger();

  return {
    name: 'authority-fixture',

    async fetch(url: string, callOptions?: ProviderCallOptions): Promise<Uint8Array> {
      throwIfCancelled(callOptions?.signal, 'fetch');
      logger.debug('Serving fixture authority record', { host: hostOf(url) });
      return bytes.slice();
    },
  };
}
