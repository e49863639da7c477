import { afterEach, describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';
import {
  DEFAULT_BASE_URL,
  loadRawConfigFromEnv,
  redactConfig,
  resolveConfig,
  safeValidateRawConfig,
  validateConfig,
  validateRawConfig,
} from '../src/config.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('validateRawConfig', () => {
    it('should apply defaults', () => {
      expect(validateRawConfig({})).toEqual({
        baseUrl: DEFAULT_BASE_URL,
        timeout: 30000,
        secretCommandTimeout: 5000,
        debug: false,
      });
    });

    it('should reject an invalid base URL', () => {
      expect(() => validateRawConfig({ baseUrl: 'not a url' })).toThrow(ZodError);
    });

    it('should reject an invalid email', () => {
      expect(() => validateRawConfig({ email: 'ops' })).toThrow(ZodError);
    });

    it('should reject a timeout below 1000ms', () => {
      expect(() => validateRawConfig({ timeout: 500 })).toThrow(ZodError);
    });

    it('should strip unknown properties', () => {
      expect(validateRawConfig({ region: 'np' })).not.toHaveProperty('region');
    });

    it('should require HTTPS in production', () => {
      vi.stubEnv('NODE_ENV', 'production');
      expect(() => validateRawConfig({ baseUrl: 'http://api.example.test/' })).toThrow('baseUrl must use HTTPS in production');
    });

    it('should allow HTTP outside production', () => {
      vi.stubEnv('NODE_ENV', 'development');
      expect(validateRawConfig({ baseUrl: 'http://localhost:8000/api/v1/' }).baseUrl).toBe('http://localhost:8000/api/v1/');
    });
  });

  describe('safeValidateRawConfig', () => {
    it('should return issues instead of throwing', () => {
      const result = safeValidateRawConfig({ timeout: 'soon' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0].path).toEqual(['timeout']);
      }
    });
  });

  describe('loadRawConfigFromEnv', () => {
    it('should read TINGTING_* variables', () => {
      const raw = loadRawConfigFromEnv({
        TINGTING_BASE_URL: 'https://api.example.test/api/v1/',
        TINGTING_API_TOKEN: 'test-token',
        TINGTING_EMAIL: 'ops@example.com',
        TINGTING_PASSWORD: 'test-password',
        TINGTING_TIMEOUT: '5000',
        TINGTING_DEBUG: 'true',
      });

      expect(raw).toEqual({
        baseUrl: 'https://api.example.test/api/v1/',
        apiToken: 'test-token',
        email: 'ops@example.com',
        password: 'test-password',
        timeout: 5000,
        secretCommandTimeout: 5000,
        debug: true,
      });
    });

    it('should ignore empty variables', () => {
      const raw = loadRawConfigFromEnv({ TINGTING_BASE_URL: '', TINGTING_API_TOKEN: '' });
      expect(raw.baseUrl).toBe(DEFAULT_BASE_URL);
      expect(raw.apiToken).toBeUndefined();
    });

    it('should read the token file and command variables', () => {
      const raw = loadRawConfigFromEnv({
        TINGTING_API_TOKEN_FILE: '~/.secrets/tingting',
        TINGTING_API_TOKEN_COMMAND: 'pass show tingting',
      });
      expect(raw.apiTokenFile).toBe('~/.secrets/tingting');
      expect(raw.apiTokenCommand).toBe('pass show tingting');
    });

    it('should parse "0" as debug disabled', () => {
      expect(loadRawConfigFromEnv({ TINGTING_DEBUG: '0' }).debug).toBe(false);
    });

    it('should reject an unrecognised debug value', () => {
      expect(() => loadRawConfigFromEnv({ TINGTING_DEBUG: 'maybe' })).toThrow(ZodError);
    });
  });

  describe('resolveConfig', () => {
    it('should resolve a direct token', () => {
      const config = resolveConfig(validateRawConfig({ apiToken: '  test-token  ', email: 'ops@example.com' }));
      expect(config).toEqual({
        baseUrl: DEFAULT_BASE_URL,
        apiToken: 'test-token',
        email: 'ops@example.com',
        password: undefined,
        timeout: 30000,
        debug: false,
      });
    });

    it('should leave a blank token unset', () => {
      expect(resolveConfig(validateRawConfig({ apiToken: '   ' })).apiToken).toBeUndefined();
    });
  });

  describe('validateConfig', () => {
    it('should require a base URL', () => {
      expect(() => validateConfig({})).toThrow(ZodError);
    });
  });

  describe('redactConfig', () => {
    it('should hide the token and password', () => {
      const redacted = redactConfig({
        baseUrl: DEFAULT_BASE_URL,
        apiToken: 'test-token',
        password: 'test-password',
        email: 'ops@example.com',
        timeout: 30000,
        debug: false,
      });

      expect(redacted.apiToken).toBe('[REDACTED]');
      expect(redacted.password).toBe('[REDACTED]');
      expect(redacted.email).toBe('ops@example.com');
    });

    it('should leave unset secrets unset', () => {
      const redacted = redactConfig({ baseUrl: DEFAULT_BASE_URL, timeout: 30000, debug: false });
      expect(redacted.apiToken).toBeUndefined();
    });
  });
});
