/**
 * JSON value types and the payload/response shapes of the TingTing API.
 *
 * Response shapes list only the fields the API is known to return; the
 * index signature keeps everything else reachable.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
/** Undefined members are dropped by JSON.stringify, so optional fields fit */
export interface JsonObject {
  [key: string]: JsonValue | undefined;
}

/** Decoded body of a successful response */
export type ApiPayload = JsonObject | JsonValue[];

/** Query parameter values accepted by list/filter endpoints */
export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue | QueryValue[]>;

/**
 * Tokens returned by auths/login/. Absent when the server answers 2xx with
 * an empty or non-JSON body.
 */
export interface LoginResponse extends JsonObject {
  access?: string;
  refresh?: string;
}

/** Returned by auths/login/refresh/ */
export interface RefreshResponse extends JsonObject {
  access?: string;
}

/** Returned by auths/generate-api-keys/ (previous keys are soft-deleted) */
export interface GeneratedApiKey extends JsonObject {
  token: string;
  message: string;
}

/** Returned by auths/get-api-keys/ */
export interface ApiKeyDetails extends JsonObject {
  token: string;
  last_used: string | null;
  created_at: string;
}

/** Filters accepted by campaign/ */
export interface CampaignFilters extends QueryParams {
  limit?: number;
  offset?: number;
  status?: string;
  search?: string;
}

/** Filters accepted by campaign-detail/{id}/ and auths/list/send-otps/ */
export interface PageFilters extends QueryParams {
  limit?: number;
  offset?: number;
}
