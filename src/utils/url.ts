/**
 * URL helpers for RPC endpoints
 *
 * @module utils/url
 */

const SENSITIVE_QUERY_PARAMS = ['apikey', 'api_key', 'key', 'token', 'secret'];

export interface UrlCredentials {
  /** URL with any `user:password@` userinfo removed */
  url: string;
  /** `Authorization` header built from the removed userinfo, empty when there was none */
  headers: Record<string, string>;
}

/**
 * Moves `user:password@` credentials out of the URL into a Basic auth header.
 * Unparseable URLs are returned unchanged.
 */
export function extractUrlCredentials(rawUrl: string): UrlCredentials {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return { url: rawUrl, headers: {} };
  }

  if (!parsed.username && !parsed.password) {
    return { url: rawUrl, headers: {} };
  }

  const username = decodeURIComponent(parsed.username);
  const password = decodeURIComponent(parsed.password);
  parsed.username = '';
  parsed.password = '';

  const token = Buffer.from(`${username}:${password}`).toString('base64');
  return { url: parsed.toString(), headers: { Authorization: `Basic ${token}` } };
}

/**
 * Masks the password and well-known secret query parameters with `***`,
 * so the URL can be logged or put in an error.
 */
export function sanitizeUrl(rawUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return rawUrl;
  }

  let masked = false;
  if (parsed.password) {
    parsed.password = '***';
    masked = true;
  }

  for (const name of [...new Set(parsed.searchParams.keys())]) {
    if (SENSITIVE_QUERY_PARAMS.includes(name.toLowerCase())) {
      parsed.searchParams.set(name, '***');
      masked = true;
    }
  }

  return masked ? parsed.toString() : rawUrl;
}
