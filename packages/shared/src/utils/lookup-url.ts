/**
 * Accept a decoded payload as an authority lookup URL.
 *
 * The payload must be an absolute http(s) URL. When `allowedHosts` is
 * non-empty the host must be listed (case-insensitive).
 *
 * @returns the URL as serialized by WHATWG URL, or undefined
 */
export function toLookupUrl(payload: string, allowedHosts: readonly string[] = []): string | undefined {
  let url: URL;
  try {
    url = new URL(payload.trim());
  } catch {
    return undefined;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return undefined;
  }

  return isAllowedLookupHost(url, allowedHosts) ? url.href : undefined;
}

/**
 * True when `allowedHosts` is empty or lists the URL's host name
 */
export function isAllowedLookupHost(url: URL, allowedHosts: readonly string[]): boolean {
  if (allowedHosts.length === 0) {
    return true;
  }
  const host = url.hostname.toLowerCase();
  return allowedHosts.some((allowed) => allowed.toLowerCase() === host);
}
