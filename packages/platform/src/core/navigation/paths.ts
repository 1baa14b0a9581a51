/**
 * Path Normalization
 *
 * Reduces item URLs and the request path to a comparable form:
 *   - query string and fragment removed
 *   - percent-encoding decoded ("john%20doe" → "john doe")
 *   - trailing slashes removed ("/admin/" → "/admin", "/" stays "/")
 *   - absolute URLs on the host's own origin reduced to their path
 *
 * Absolute URLs on any other origin keep their origin, so an external
 * link never matches an internal path.
 */

const ABSOLUTE_URL = /^[a-z][a-z\d+\-.]*:\/\//i;

function parseUrl(value: string, base?: string): URL | undefined {
  try {
    return new URL(value, base);
  } catch {
    return undefined;
  }
}

function decodePath(path: string): string {
  try {
    return decodeURI(path);
  } catch {
    // Malformed escape sequence: compare the raw text
    return path;
  }
}

function cleanPath(path: string): string {
  const end = path.search(/[?#]/);
  const withoutQuery = end === -1 ? path : path.slice(0, end);
  const trimmed = decodePath(withoutQuery).replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
}

/**
 * Normalizes a URL or path for active-state matching.
 *
 * @param origin - The host's own origin (e.g., "https://app.example.test").
 *   Absolute URLs on this origin are reduced to their path.
 */
export function normalizePath(url: string, origin?: string): string {
  const value = url.trim();
  const isAbsolute = ABSOLUTE_URL.test(value) || value.startsWith("//");
  if (!isAbsolute) {
    return cleanPath(value);
  }

  const parsed = parseUrl(value, origin);
  if (!parsed) {
    return cleanPath(value);
  }

  const ownOrigin = origin !== undefined ? parseUrl(origin)?.origin : undefined;
  if (ownOrigin !== undefined && parsed.origin === ownOrigin) {
    return cleanPath(parsed.pathname);
  }
  return `${parsed.origin}${cleanPath(parsed.pathname)}`;
}
