import type { HttpClient } from '@efaktur/contracts';

/**
 * Default HTTP client using native fetch.
 * Redirects are returned to the caller unfollowed.
 */
export function createDefaultHttpClient(): HttpClient {
  // Resolved once so tests can stub globalThis.fetch before creating the client
  const httpRequest: typeof globalThis.fetch = globalThis['fetch'];

  return {
    async get(url, options) {
      const init: RequestInit = { method: 'GET', redirect: 'manual' };
      if (options?.headers !== undefined) {
        init.headers = options.headers;
      }
      if (options?.signal !== undefined) {
        init.signal = options.signal;
      }
      const response = await httpRequest(url, init);
      return response;
    },
  };
}
