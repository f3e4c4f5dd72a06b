/**
 * Normalize a URL for caching and fetching:
 * - Lowercase the host and drop the default port
 * - Drop the fragment
 * - Remove the trailing slash from a non-root path
 * - Keep the query string as it is
 *
 * @throws Error if the URL cannot be parsed
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new Error(`Invalid URL format: ${url}`, { cause: error });
  }

  let pathname = parsed.pathname;
  if (pathname.endsWith('/') && pathname.length > 1) {
    pathname = pathname.slice(0, -1);
  }

  // URL already lowercases the host and strips a default port
  return `${parsed.protocol}//${parsed.host}${pathname}${parsed.search}`;
}

/**
 * True for absolute http(s) URLs with a host and no embedded credentials
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (
      (parsed.protocol === 'http:' || parsed.protocol === 'https:') &&
      parsed.hostname !== '' &&
      parsed.username === '' &&
      parsed.password === ''
    );
  } catch {
    return false;
  }
}
