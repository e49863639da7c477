import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { bulkContactsFrom, bulkData, bulkFile, isReadableFile } from '../src/bulk-input.js';

describe('bulk contacts input', () => {
  let dir: string;
  let csvPath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'tingting-input-'));
    csvPath = join(dir, 'contacts.xlsx');
    writeFileSync(csvPath, 'placeholder');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('constructors', () => {
    it('should tag file and data inputs', () => {
      expect(bulkFile('/tmp/contacts.csv')).toEqual({ type: 'file', path: '/tmp/contacts.csv' });
      expect(bulkData({ contacts: [] })).toEqual({ type: 'data', payload: { contacts: [] } });
    });
  });

  describe('isReadableFile', () => {
    it('should accept an existing file', () => {
      expect(isReadableFile(csvPath)).toBe(true);
    });

    it('should reject a missing path', () => {
      expect(isReadableFile(join(dir, 'missing.csv'))).toBe(false);
    });

    it('should reject a directory', () => {
      expect(isReadableFile(dir)).toBe(false);
    });
  });

  describe('bulkContactsFrom', () => {
    it('should upload a string naming an existing file', () => {
      expect(bulkContactsFrom(csvPath)).toEqual({ type: 'file', path: csvPath });
    });

    it('should send a string that names no file as JSON', () => {
      const missing = join(dir, 'missing.csv');
      expect(bulkContactsFrom(missing)).toEqual({ type: 'data', payload: missing });
    });

    it('should send a mapping as JSON', () => {
      const payload = { contacts: [{ number: '9800000001' }] };
      expect(bulkContactsFrom(payload)).toEqual({ type: 'data', payload });
    });

    it('should send a list as JSON', () => {
      const payload = [{ number: '9800000001' }, { number: '9800000002' }];
      expect(bulkContactsFrom(payload)).toEqual({ type: 'data', payload });
    });
  });
});
