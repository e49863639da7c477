import type { QueryParams } from './types.js';

/**
 * Encodes filters as application/x-www-form-urlencoded, keeping key order.
 * Null and undefined entries are dropped; arrays repeat the key; booleans
 * are sent as 1 and 0.
 */
export function encodeQuery(params: QueryParams | undefined): string {
  if (!params) {
    return '';
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item === null || item === undefined) continue;
      search.append(key, typeof item === 'boolean' ? (item ? '1' : '0') : String(item));
    }
  }
  return search.toString();
}
