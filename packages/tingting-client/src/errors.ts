/**
 * Error type for every failed TingTing API call, and the result wrapper the
 * client returns instead of throwing.
 */

import type { JsonValue } from './types.js';

/** Code used when no HTTP response was obtained */
export const TRANSPORT_ERROR_CODE = 0;

/**
 * A failed request.
 *
 * `code` is the HTTP status, or 0 when the request never got a response.
 * `rawData` is the parsed error body when the server sent valid JSON.
 */
export class TingTingApiError extends Error {
  readonly code: number;
  readonly rawData: JsonValue | null;

  constructor(message: string, code: number, rawData: JsonValue | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TingTingApiError';
    this.code = code;
    this.rawData = rawData;
  }
}

/** API response wrapper */
export type ApiResult<T> = { success: true; data: T } | { success: false; error: TingTingApiError };

export function isTingTingApiError(value: unknown): value is TingTingApiError {
  return value instanceof TingTingApiError;
}

/**
 * Returns the data of a successful result, or throws its error.
 */
export function unwrap<T>(result: ApiResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
