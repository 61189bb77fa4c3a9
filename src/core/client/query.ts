import type { Units } from '../../config/index.js';
import type { QueryValue } from '../../ports/WeatherPort.js';
import { ValidationError } from '../../utils/errors.js';

export const API_KEY_PARAM = 'appid';
export const LOCATION_PARAMS = ['id', 'q', 'lat', 'lon', 'zip', 'bbox'] as const;

const REDACTED = '***';

export type LocationParams = Array<[string, QueryValue]>;

export interface QueryInput {
  apiKey: string;
  location: LocationParams;
  /** Undefined for endpoints that take neither `units` nor `lang`. */
  localization?: { units: Units; lang?: string };
  extra?: Record<string, QueryValue>;
}

const RESERVED_PARAMS: ReadonlySet<string> = new Set<string>([API_KEY_PARAM, ...LOCATION_PARAMS]);

/**
 * Query order is `appid`, location, `units`, `lang`, extras. Every key is
 * written once: extras may not name a key already set, nor the API key or a
 * location parameter.
 */
export function buildQuery(input: QueryInput): URLSearchParams {
  const query = new URLSearchParams();
  query.set(API_KEY_PARAM, input.apiKey);

  for (const [key, value] of input.location) {
    query.set(key, String(value));
  }

  if (input.localization) {
    query.set('units', input.localization.units);
    if (input.localization.lang !== undefined) {
      query.set('lang', input.localization.lang);
    }
  }

  for (const [key, value] of Object.entries(input.extra ?? {})) {
    if (RESERVED_PARAMS.has(key) || query.has(key)) {
      throw new ValidationError(`Query parameter "${key}" cannot be overridden`);
    }
    query.set(key, String(value));
  }

  return query;
}

export function redactUrl(url: URL): string {
  if (!url.searchParams.has(API_KEY_PARAM)) {
    return url.toString();
  }
  const copy = new URL(url.toString());
  copy.searchParams.set(API_KEY_PARAM, REDACTED);
  return copy.toString();
}

export function scrubSecret(text: string, secret: string): string {
  return secret ? text.split(secret).join(REDACTED) : text;
}
