import { ConstructURLError } from '../error/constructUrlError.js';
import type { QueryItems } from '../types/request.js';
import { queryString } from './queryString.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Matches paths that already carry a scheme and host. */
const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Builds the absolute URL of a request descriptor.
 *
 * - Absolute `http(s)://` paths are used verbatim, the base URL is ignored.
 * - Relative paths are joined to the base URL with exactly one `/`.
 * - Query items are appended in order with `?`, or `&` when the path already has a query.
 *
 * @param baseUrl - Base URL the client was configured with (e.g. `https://api.example.com/v1`).
 * @param path - Descriptor path (e.g. `/users/1` or `https://cdn.example.com/a.png`).
 * @param query - Ordered query items of the descriptor.
 * @returns A tuple `[error, url]` with the normalized URL, the error being a {@link ConstructURLError}.
 */
export function constructUrl(baseUrl: string, path: string, query?: QueryItems): SafeWrap<Error, string> {
  let url = ABSOLUTE_URL.test(path) ? path : joinPath(baseUrl, path);

  const search = query ? queryString(query) : '';
  if (search) {
    url += `${url.includes('?') ? '&' : '?'}${search}`;
  }

  const [errUrl, parsed] = safeWrap(() => new URL(url));
  if (errUrl) {
    return [new ConstructURLError(`error constructing URL for path ${path}`, url, { cause: errUrl }), null];
  }

  // Normalized form, as fetch sends it
  return [null, parsed.href];
}

/**
 * Joins base URL and relative path, stripping a leading slash from the path to avoid `//`.
 */
function joinPath(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${path.replace(/^\//, '')}`;
}
