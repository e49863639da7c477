/**
 * HTTP client for the TingTing API.
 * Handles bearer authentication, JSON and multipart request bodies, response
 * decoding, and translation of every failure into a TingTingApiError.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { BulkContactsInput } from './bulk-input.js';
import type { TingTingConfig } from './config.js';
import { DEFAULT_TIMEOUT } from './config.js';
import { TRANSPORT_ERROR_CODE, TingTingApiError, type ApiResult } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { encodeQuery } from './query.js';
import type {
  ApiKeyDetails,
  ApiPayload,
  CampaignFilters,
  GeneratedApiKey,
  JsonObject,
  JsonValue,
  LoginResponse,
  PageFilters,
  QueryParams,
  RefreshResponse,
} from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** A file sent as one part of a multipart body */
export interface MultipartFile {
  name: string;
  path: string;
  /** Defaults to the basename of `path` */
  filename?: string;
}

/** Request options */
export interface RequestOptions {
  /** JSON request body */
  json?: JsonValue;
  /** Query string parameters */
  query?: QueryParams;
  /** Multipart file parts; takes the place of `json` */
  multipart?: MultipartFile[];
  /** Custom timeout in ms (overrides config) */
  timeout?: number;
}

/** API client options */
export interface TingTingClientOptions {
  config: Pick<TingTingConfig, 'baseUrl'> & Partial<TingTingConfig>;
  logger?: Logger;
}

/**
 * Decodes a success body. Anything that is not a JSON object or array,
 * including an empty or malformed body, becomes an empty object.
 */
function decodeSuccessBody(text: string): ApiPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  return isJsonContainer(parsed) ? parsed : {};
}

/**
 * Decodes an error body, returning null when it is not valid JSON.
 */
function decodeErrorBody(text: string): JsonValue | null {
  if (text === '') {
    return null;
  }
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

function isJsonContainer(value: unknown): value is ApiPayload {
  return typeof value === 'object' && value !== null;
}

function isJsonObject(value: JsonValue | null): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The server's `message` field, when it is a string or a number.
 */
function errorMessageFrom(rawData: JsonValue | null): string | undefined {
  if (!isJsonObject(rawData)) {
    return undefined;
  }
  const { message } = rawData;
  if (typeof message === 'string' || typeof message === 'number') {
    return String(message);
  }
  return undefined;
}

function invalidId(ids: Record<string, number>): TingTingApiError | undefined {
  for (const [label, id] of Object.entries(ids)) {
    if (!Number.isSafeInteger(id) || id < 0) {
      return new TingTingApiError(`${label} must be a non-negative integer, got ${String(id)}`, TRANSPORT_ERROR_CODE);
    }
  }
  return undefined;
}

/**
 * Client for the TingTing telephony/SMS API.
 *
 * Every operation issues exactly one request and resolves to an ApiResult;
 * nothing is retried.
 */
export class TingTingClient {
  private readonly baseUrl: string;
  private readonly apiToken: string | undefined;
  private readonly email: string | undefined;
  private readonly password: string | undefined;
  private readonly timeout: number;
  private readonly logger: Logger;
  private token: string | undefined;

  constructor(options: TingTingClientOptions) {
    const { config } = options;
    // Relative paths resolve under the base only with a trailing slash
    this.baseUrl = config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`;
    this.apiToken = config.apiToken || undefined;
    this.email = config.email;
    this.password = config.password;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.logger = options.logger ?? createLogger('tingting-client', { debug: config.debug });
  }

  /**
   * Sets the bearer token (JWT or API token). Takes precedence over the
   * configured static token.
   */
  setToken(token: string): this {
    this.token = token;
    return this;
  }

  /** Alias for setToken */
  setApiToken(token: string): this {
    return this.setToken(token);
  }

  clearToken(): this {
    this.token = undefined;
    return this;
  }

  /** The token sent with the next request, if any */
  getToken(): string | undefined {
    return this.token ?? this.apiToken;
  }

  private buildHeaders(token: string | undefined, multipart: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
    };

    // fetch sets the multipart boundary itself
    if (!multipart) {
      headers['Content-Type'] = 'application/json';
    }

    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return headers;
  }

  private async buildMultipartBody(parts: MultipartFile[]): Promise<FormData> {
    const form = new FormData();
    for (const part of parts) {
      const contents = await readFile(part.path);
      form.append(part.name, new Blob([contents]), part.filename ?? basename(part.path));
    }
    return form;
  }

  /**
   * Sends one request to `baseUrl + path` and decodes the response.
   */
  async request<T extends ApiPayload = ApiPayload>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiResult<T>> {
    const token = this.getToken();
    const query = encodeQuery(options.query);
    const url = `${this.baseUrl}${path}${query ? `?${query}` : ''}`;
    const multipart = options.multipart !== undefined;
    const timeout = options.timeout ?? this.timeout;

    this.logger.debug('API request', { method, path, multipart });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const body = options.multipart
        ? await this.buildMultipartBody(options.multipart)
        : options.json !== undefined
          ? JSON.stringify(options.json)
          : undefined;

      const response = await fetch(url, {
        method,
        headers: this.buildHeaders(token, multipart),
        body,
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        const rawData = decodeErrorBody(text);
        const transportMessage = response.statusText || `HTTP ${response.status}`;
        const message = errorMessageFrom(rawData) ?? transportMessage;

        this.logger.error('API request failed', { method, path, status: response.status, error: message });

        return { success: false, error: new TingTingApiError(message, response.status, rawData) };
      }

      // The decoded shape is the API's contract for this endpoint
      return { success: true, data: decodeSuccessBody(text) as T };
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'AbortError' ? `Request timed out after ${timeout}ms` : error instanceof Error ? error.message : 'Unknown error';

      this.logger.error('API request failed', { method, path, error: message });

      return { success: false, error: new TingTingApiError(message, TRANSPORT_ERROR_CODE, null, { cause: error }) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Runs `send` unless an identifier is not a usable path segment.
   */
  private async withIds<T extends ApiPayload>(ids: Record<string, number>, send: () => Promise<ApiResult<T>>): Promise<ApiResult<T>> {
    const error = invalidId(ids);
    if (error) {
      return { success: false, error };
    }
    return send();
  }

  // --- Authentication ---

  /** Logs in for access and refresh tokens */
  async login(email: string, password: string): Promise<ApiResult<LoginResponse>> {
    return this.request<LoginResponse>('POST', 'auths/login/', { json: { email, password } });
  }

  /**
   * Logs in with the given or configured credentials and, on success,
   * uses the returned access token for later requests.
   */
  async authenticate(email?: string, password?: string): Promise<ApiResult<LoginResponse>> {
    const loginEmail = email ?? this.email;
    const loginPassword = password ?? this.password;
    if (!loginEmail || !loginPassword) {
      return {
        success: false,
        error: new TingTingApiError('No credentials available: pass email and password or configure them', TRANSPORT_ERROR_CODE),
      };
    }

    const result = await this.login(loginEmail, loginPassword);
    if (result.success && typeof result.data.access === 'string') {
      this.setToken(result.data.access);
    }
    return result;
  }

  async refreshToken(refresh: string): Promise<ApiResult<RefreshResponse>> {
    return this.request<RefreshResponse>('POST', 'auths/login/refresh/', { json: { refresh } });
  }

  /** Generates a new static API token; earlier keys are soft-deleted by the server */
  async generateApiKeys(): Promise<ApiResult<GeneratedApiKey>> {
    return this.request<GeneratedApiKey>('POST', 'auths/generate-api-keys/');
  }

  async getApiKeys(): Promise<ApiResult<ApiKeyDetails>> {
    return this.request<ApiKeyDetails>('GET', 'auths/get-api-keys/');
  }

  async userDetail(): Promise<ApiResult<ApiPayload>> {
    return this.request('GET', 'auths/user-profile/');
  }

  // --- Phone numbers ---

  async activeBrokerPhones(): Promise<ApiResult<ApiPayload>> {
    return this.request('GET', 'active-broker-phone/');
  }

  /** Active phone numbers assigned to the user */
  async activeUserPhones(): Promise<ApiResult<ApiPayload>> {
    return this.request('GET', 'phone-number/active/');
  }

  // --- Campaigns ---

  async listCampaigns(filters: CampaignFilters = {}): Promise<ApiResult<ApiPayload>> {
    return this.request('GET', 'campaign/', { query: filters });
  }

  async createCampaign(data: JsonObject): Promise<ApiResult<ApiPayload>> {
    return this.request('POST', 'campaign/create/', { json: data });
  }

  async updateCampaign(campaignId: number, data: JsonObject): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ campaignId }, () => this.request('POST', `campaign/${campaignId}/`, { json: data }));
  }

  async deleteCampaign(campaignId: number): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ campaignId }, () => this.request('DELETE', `campaign/${campaignId}/`));
  }

  async runCampaign(campaignId: number): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ campaignId }, () => this.request('POST', `run-campaign/${campaignId}/`));
  }

  async addVoiceAssistance(campaignId: number, data: JsonObject): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ campaignId }, () => this.request('PATCH', `campaign/create/${campaignId}/message/`, { json: data }));
  }

  // --- Contacts ---

  /** Adds one contact, or several when given an array */
  async addContact(campaignId: number, data: JsonObject | JsonObject[]): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ campaignId }, () => this.request('POST', `campaign/${campaignId}/add-contact/`, { json: data }));
  }

  /**
   * Adds contacts in bulk, either by uploading a file as `bulk_file` or by
   * sending the contacts as JSON.
   */
  async addBulkContacts(campaignId: number, input: BulkContactsInput): Promise<ApiResult<ApiPayload>> {
    const options: RequestOptions = input.type === 'file' ? { multipart: [{ name: 'bulk_file', path: input.path }] } : { json: input.payload };
    return this.withIds({ campaignId }, () => this.request('POST', `campaign/create/${campaignId}/detail/`, options));
  }

  async listContacts(campaignId: number, filters: PageFilters = {}): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ campaignId }, () => this.request('GET', `campaign-detail/${campaignId}/`, { query: filters }));
  }

  async deleteContact(contactId: number): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ contactId }, () => this.request('DELETE', `phone-number/delete/${contactId}/`));
  }

  async getContactAttributes(contactId: number): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ contactId }, () => this.request('GET', `campaign/${contactId}/attributes/`));
  }

  async editContactAttributes(contactId: number, attributes: JsonObject): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ contactId }, () => this.request('PATCH', `campaign/${contactId}/attributes/`, { json: attributes }));
  }

  async updateContactNumber(contactId: number, number: string): Promise<ApiResult<ApiPayload>> {
    return this.withIds({ contactId }, () => this.request('PATCH', `phone-number/update/${contactId}/`, { json: { number } }));
  }

  // --- OTP ---

  async sendOtp(data: JsonObject): Promise<ApiResult<ApiPayload>> {
    return this.request('POST', 'auths/send/otp/', { json: data });
  }

  async listSentOtps(filters: PageFilters = {}): Promise<ApiResult<ApiPayload>> {
    return this.request('GET', 'auths/list/send-otps/', { query: filters });
  }
}

/**
 * Creates a new TingTing client.
 */
export function createTingTingClient(options: TingTingClientOptions): TingTingClient {
  return new TingTingClient(options);
}
