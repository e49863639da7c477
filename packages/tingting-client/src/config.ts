/**
 * Client configuration schema using Zod.
 *
 * The static API token can be given directly, read from a file, or produced
 * by a command (see secrets.ts). Unknown properties are stripped.
 */

import { z } from 'zod';
import type { Logger } from './logger.js';
import { resolveSecret } from './secrets.js';

export const DEFAULT_BASE_URL = 'https://app.tingting.io/api/v1/';
export const DEFAULT_TIMEOUT = 30000;

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

/** Accepts the strings env vars carry as well as real booleans */
const booleanish = z.union([z.boolean(), z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')]);

/**
 * Raw configuration (before secret resolution).
 */
export const RawTingTingConfigSchema = z
  .object({
    /** API base URL (must be HTTPS in production) */
    baseUrl: z
      .string()
      .url('baseUrl must be a valid URL')
      .refine((url) => url.startsWith('https://') || !isProduction(), {
        message: 'baseUrl must use HTTPS in production',
      })
      .default(DEFAULT_BASE_URL),

    apiToken: z.string().optional(),
    apiTokenFile: z.string().optional(),
    apiTokenCommand: z.string().optional(),

    email: z.string().email('email must be a valid email address').optional(),
    password: z.string().min(1).optional(),

    timeout: z.coerce
      .number()
      .int()
      .min(1000, 'timeout must be at least 1000ms')
      .max(120000, 'timeout must be at most 120000ms')
      .default(DEFAULT_TIMEOUT),

    secretCommandTimeout: z.coerce.number().int().min(1000).max(30000).default(5000),

    debug: booleanish.default(false),
  })
  .strip();

export type RawTingTingConfig = z.infer<typeof RawTingTingConfigSchema>;
export type RawTingTingConfigInput = z.input<typeof RawTingTingConfigSchema>;

/**
 * Resolved configuration, handed to the client.
 */
export const TingTingConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiToken: z.string().min(1).optional(),
  email: z.string().email().optional(),
  password: z.string().min(1).optional(),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  debug: z.boolean().default(false),
});

export type TingTingConfig = z.infer<typeof TingTingConfigSchema>;
export type TingTingConfigInput = z.input<typeof TingTingConfigSchema>;

/**
 * Validates raw configuration. Throws a ZodError on failure.
 */
export function validateRawConfig(config: unknown): RawTingTingConfig {
  return RawTingTingConfigSchema.parse(config);
}

export function safeValidateRawConfig(config: unknown): { success: true; data: RawTingTingConfig } | { success: false; errors: z.ZodIssue[] } {
  const result = RawTingTingConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error.issues };
}

/**
 * Validates resolved configuration. Throws a ZodError on failure.
 */
export function validateConfig(config: unknown): TingTingConfig {
  return TingTingConfigSchema.parse(config);
}

/** Environment variable for each raw config key */
export const ENV_VARS = {
  baseUrl: 'TINGTING_BASE_URL',
  apiToken: 'TINGTING_API_TOKEN',
  apiTokenFile: 'TINGTING_API_TOKEN_FILE',
  apiTokenCommand: 'TINGTING_API_TOKEN_COMMAND',
  email: 'TINGTING_EMAIL',
  password: 'TINGTING_PASSWORD',
  timeout: 'TINGTING_TIMEOUT',
  debug: 'TINGTING_DEBUG',
} as const satisfies Partial<Record<keyof RawTingTingConfig, string>>;

/**
 * Reads raw configuration from environment variables.
 * Unset and empty variables are left out so schema defaults apply.
 */
export function loadRawConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RawTingTingConfig {
  const raw: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return validateRawConfig(raw);
}

/**
 * Resolves the API token secret and produces the client configuration.
 */
export function resolveConfig(raw: RawTingTingConfig, logger?: Logger): TingTingConfig {
  const apiToken = resolveSecret(
    {
      direct: raw.apiToken,
      file: raw.apiTokenFile,
      command: raw.apiTokenCommand,
      commandTimeout: raw.secretCommandTimeout,
    },
    logger,
  );

  return validateConfig({
    baseUrl: raw.baseUrl,
    apiToken,
    email: raw.email,
    password: raw.password,
    timeout: raw.timeout,
    debug: raw.debug,
  });
}

/** Fields replaced by redactConfig */
const SECRET_FIELDS = ['apiToken', 'password'] as const;

/**
 * Create a safe-to-log copy of the config with secrets redacted.
 */
export function redactConfig(config: TingTingConfig): TingTingConfig {
  const redacted = { ...config };
  for (const field of SECRET_FIELDS) {
    if (redacted[field]) {
      redacted[field] = '[REDACTED]';
    }
  }
  return redacted;
}
