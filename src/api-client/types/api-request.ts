export type QueryValue = string | number | boolean;

/**
 * Query parameters of a request. A list value repeats the key once per item.
 */
export type QueryParams = Record<string, QueryValue | readonly QueryValue[]>;

export interface ApiRequest {
  params(): QueryParams;
}
