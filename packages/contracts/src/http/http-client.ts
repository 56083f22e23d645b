/**
 * HTTP client interface for pluggable HTTP implementation.
 * Pipeline packages never call fetch() directly.
 */
export interface HttpClient {
  /**
   * Make an HTTP GET request
   */
  get(
    url: string,
    options?: { headers?: Record<string, string>; signal?: AbortSignal },
  ): Promise<HttpResponse>;
}

/**
 * HTTP response interface
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}
