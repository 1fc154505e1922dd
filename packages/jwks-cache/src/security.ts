/**
 * SSRF protection for JWKS fetching.
 *
 * DNS-level private-address checks are out of reach for a plain fetch; this
 * module blocks what can be decided from the URL alone.
 */

import { ErrorCodes, JwksError } from './errors.js';

export interface UrlPolicy {
  /** Allow http:// and https:// to localhost (dev only) */
  allowLocalhost?: boolean;
  /** Optional allowlist callback for enterprise deployments */
  isAllowedHost?: (host: string) => boolean;
}

/**
 * Validate a JWKS URL before fetching it.
 *
 * @throws JwksError E_SSRF_BLOCKED if the URL is blocked
 */
export function validateUrl(url: string, policy: UrlPolicy = {}): URL {
  let parsed: URL;

  try {
    parsed = new URL(url);
  } catch (err) {
    throw new JwksError(ErrorCodes.SSRF_BLOCKED, `Invalid URL: ${url}`, { cause: err });
  }

  const hostname = parsed.hostname.toLowerCase();
  const localhost = isLocalhostHost(hostname);

  if (localhost && !policy.allowLocalhost) {
    throw new JwksError(ErrorCodes.SSRF_BLOCKED, `Localhost blocked: ${hostname}`);
  }

  // HTTPS required, except http://localhost in dev mode
  const insecureAllowed = parsed.protocol === 'http:' && localhost;
  if (parsed.protocol !== 'https:' && !insecureAllowed) {
    throw new JwksError(ErrorCodes.SSRF_BLOCKED, `HTTPS required, got ${parsed.protocol}`);
  }

  if (!localhost && (isLiteralIp(hostname) || isMetadataIp(hostname))) {
    throw new JwksError(ErrorCodes.SSRF_BLOCKED, `Literal IP addresses blocked: ${hostname}`);
  }

  if (policy.isAllowedHost && !policy.isAllowedHost(hostname)) {
    throw new JwksError(ErrorCodes.SSRF_BLOCKED, `Host not in allowlist: ${hostname}`);
  }

  return parsed;
}

/**
 * Check if hostname is localhost variant.
 */
function isLocalhostHost(hostname: string): boolean {
  return (
    hostname === 'localhost' ||
    hostname === '127.0.0.1' ||
    hostname === '::1' ||
    hostname === '[::1]' ||
    hostname.endsWith('.localhost')
  );
}

/**
 * Check if hostname is a literal IP address.
 */
function isLiteralIp(hostname: string): boolean {
  if (/^(\d{1,3}\.){3}\d{1,3}$/.test(hostname)) {
    return true;
  }

  // IPv6, bracketed as URL.hostname reports it, or bare
  return hostname.startsWith('[') || hostname.includes(':');
}

/**
 * Check if hostname is a cloud metadata or link-local address.
 */
export function isMetadataIp(hostname: string): boolean {
  return hostname.startsWith('169.254.');
}
