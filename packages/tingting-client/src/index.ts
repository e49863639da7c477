/**
 * TingTing client SDK
 *
 * Construct a client and pass it to whatever needs it:
 *
 * ```ts
 * const client = createTingTingClientFromEnv()
 * const result = await client.listCampaigns({ limit: 5 })
 * ```
 */

import { createTingTingClient, type TingTingClient } from './api-client.js'
import { loadRawConfigFromEnv, resolveConfig } from './config.js'
import { createLogger, type Logger } from './logger.js'

export { TingTingClient, createTingTingClient } from './api-client.js'
export type { HttpMethod, MultipartFile, RequestOptions, TingTingClientOptions } from './api-client.js'
export { bulkContactsFrom, bulkData, bulkFile, isReadableFile } from './bulk-input.js'
export type { BulkContactsData, BulkContactsFile, BulkContactsInput } from './bulk-input.js'
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  ENV_VARS,
  RawTingTingConfigSchema,
  TingTingConfigSchema,
  loadRawConfigFromEnv,
  redactConfig,
  resolveConfig,
  safeValidateRawConfig,
  validateConfig,
  validateRawConfig,
} from './config.js'
export type { RawTingTingConfig, RawTingTingConfigInput, TingTingConfig, TingTingConfigInput } from './config.js'
export { TRANSPORT_ERROR_CODE, TingTingApiError, isTingTingApiError, unwrap } from './errors.js'
export type { ApiResult } from './errors.js'
export { createLogger, redactSensitive } from './logger.js'
export type { LogLevel, Logger, LoggerOptions } from './logger.js'
export { encodeQuery } from './query.js'
export type * from './types.js'

export interface CreateFromEnvOptions {
  env?: NodeJS.ProcessEnv
  logger?: Logger
}

/**
 * Builds a client from TINGTING_* environment variables, resolving the API
 * token from its file or command when configured.
 */
export function createTingTingClientFromEnv(options: CreateFromEnvOptions = {}): TingTingClient {
  const raw = loadRawConfigFromEnv(options.env)
  const logger = options.logger ?? createLogger('tingting-client', { debug: raw.debug })
  const config = resolveConfig(raw, logger)
  return createTingTingClient({ config, logger })
}
