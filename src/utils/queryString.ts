import type { QueryItems } from '../types/request.js';

/**
 * Serializes ordered query items into a query string (without the leading `?`).
 *
 * - Order is preserved and repeated keys are kept, e.g. `a=1&a=2`.
 * - Items without a value (`null`/`undefined`) render as the bare key: `flag`.
 * - Empty string values render with the separator: `flag=`.
 * - Keys and values are percent-encoded with `encodeURIComponent`.
 */
export function queryString(items: QueryItems): string {
  return items
    .map(([key, value]) =>
      value === null || value === undefined
        ? encodeURIComponent(key)
        : `${encodeURIComponent(key)}=${encodeURIComponent(value)}`,
    )
    .join('&');
}
