/**
 * Input for campaign/create/{id}/detail/.
 *
 * The endpoint takes either an uploaded spreadsheet (multipart field
 * `bulk_file`) or the contacts inline as JSON.
 */

import { accessSync, constants, statSync } from 'node:fs';
import type { JsonValue } from './types.js';

/** Upload the file at `path` as `bulk_file` */
export interface BulkContactsFile {
  type: 'file';
  path: string;
}

/** Send `payload` as the JSON body */
export interface BulkContactsData {
  type: 'data';
  payload: JsonValue;
}

export type BulkContactsInput = BulkContactsFile | BulkContactsData;

export function bulkFile(path: string): BulkContactsFile {
  return { type: 'file', path };
}

export function bulkData(payload: JsonValue): BulkContactsData {
  return { type: 'data', payload };
}

/**
 * Checks whether `path` names an existing regular file the process can read.
 */
export function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks the request shape from the value itself: a string naming a readable
 * file is uploaded, anything else is sent as JSON.
 */
export function bulkContactsFrom(value: JsonValue): BulkContactsInput {
  if (typeof value === 'string' && isReadableFile(value)) {
    return bulkFile(value);
  }
  return bulkData(value);
}
