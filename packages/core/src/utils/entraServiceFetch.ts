import * as packageJson from '../../package.json';

/**
 * Wrapper around fetch() for calls to the identity provider's discovery and JWKS endpoints.
 *
 * Adds a User-Agent header (unless the caller set one) and aborts the request once
 * `timeoutMs` has elapsed, so a hanging provider cannot stall token verification.
 *
 * @param url - Request URL (string or URL object)
 * @param timeoutMs - Milliseconds before the request is aborted
 * @param init - Fetch options (headers, method, etc.)
 * @returns Promise resolving to Response
 * @throws {DOMException} `TimeoutError` when the deadline passes before a response arrives
 *
 * @example
 * ```typescript
 * const response = await entraServiceFetch(
 *   'https://login.microsoftonline.com/contoso.onmicrosoft.com/v2.0/.well-known/openid-configuration',
 *   5_000,
 * );
 * ```
 */
// oxlint-disable-next-line require-await
export async function entraServiceFetch(
  url: string | URL,
  timeoutMs: number,
  init?: RequestInit,
): Promise<Response> {
  const headers = new Headers(init?.headers);
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', `entra-guard/${packageJson.version}`);
  }
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }
  return fetch(url, {
    ...init,
    headers,
    signal: AbortSignal.timeout(timeoutMs),
  });
}
