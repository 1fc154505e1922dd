/**
 * HTTP transport for JWKS documents.
 */

import { ErrorCodes, JwksError } from './errors.js';
import { validateUrl, type UrlPolicy } from './security.js';
import type { JwksFetcher } from './types.js';

export const DEFAULT_MAX_RESPONSE_BYTES = 1024 * 1024; // 1MB

export interface HttpFetcherOptions extends UrlPolicy {
  /** Max response size in bytes (defaults to 1MB) */
  maxResponseBytes?: number;
  /** User-Agent header value */
  userAgent?: string;
}

/**
 * Create a JwksFetcher backed by the global fetch.
 *
 * Validates the URL against SSRF rules, refuses redirects, and rejects
 * non-2xx responses and bodies over the size limit. Cancellation comes
 * from the resolver's signal.
 */
export function createHttpFetcher(options: HttpFetcherOptions = {}): JwksFetcher {
  const { maxResponseBytes = DEFAULT_MAX_RESPONSE_BYTES, userAgent = 'didtoken-jwks/0.1' } =
    options;

  return async (uri, { signal }) => {
    const url = validateUrl(uri, options);

    const response = await fetch(url, {
      signal,
      redirect: 'error', // No redirect following (fail-closed)
      headers: {
        Accept: 'application/json',
        'User-Agent': userAgent,
      },
    });

    if (!response.ok) {
      throw new JwksError(
        ErrorCodes.JWKS_FETCH_FAILED,
        `HTTP ${response.status}: ${response.statusText}`
      );
    }

    const contentLength = response.headers.get('content-length');
    if (contentLength && parseInt(contentLength, 10) > maxResponseBytes) {
      throw new JwksError(ErrorCodes.JWKS_TOO_LARGE, `Response too large: ${contentLength} bytes`);
    }

    const body = new Uint8Array(await response.arrayBuffer());
    if (body.byteLength > maxResponseBytes) {
      throw new JwksError(ErrorCodes.JWKS_TOO_LARGE, `Response too large: ${body.byteLength} bytes`);
    }

    return body;
  };
}
