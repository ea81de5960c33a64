import { QueryParams, QueryValue } from './types';

export interface ApiKey {
  name: string;
  value: string;
}

function toValues(value: QueryValue | readonly QueryValue[]): string[] {
  return Array.isArray(value) ? value.map(String) : [String(value)];
}

/**
 * Form-encodes `params` with keys in sorted order so the same parameters
 * always produce the same query string. When `apiKey` carries a value it is
 * set on the query, replacing any parameter of the same name.
 */
export function buildAuthQuery(params: QueryParams, apiKey?: ApiKey): string {
  const merged = new Map<string, string[]>();
  for (const [key, value] of Object.entries(params)) {
    merged.set(key, toValues(value));
  }

  if (apiKey?.value) {
    merged.set(apiKey.name, [apiKey.value]);
  }

  const search = new URLSearchParams();
  for (const key of [...merged.keys()].sort()) {
    for (const value of merged.get(key) ?? []) {
      search.append(key, value);
    }
  }

  return search.toString();
}
