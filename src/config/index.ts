import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_BASE_URL = 'https://api.openweathermap.org';
export const DEFAULT_CITY_LIST_URL = 'https://bulk.openweathermap.org/sample/city.list.json.gz';
export const DEFAULT_TIMEOUT_MS = 10000;

export const unitsSchema = z.enum(['metric', 'imperial', 'standard']);

export type Units = z.infer<typeof unitsSchema>;

const configSchema = z.object({
  apiKey: z.string().trim().min(1, 'API key is required'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  cityListUrl: z.string().url().default(DEFAULT_CITY_LIST_URL),
  units: unitsSchema.default('metric'),
  lang: z.string().trim().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type ClientConfig = z.infer<typeof configSchema>;

export type ClientConfigInput = z.input<typeof configSchema>;

export function parseClientConfig(raw: ClientConfigInput): Readonly<ClientConfig> {
  return validate(raw);
}

function validate(raw: unknown): Readonly<ClientConfig> {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return Object.freeze(result.data);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Readonly<ClientConfig> {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  return validate({
    apiKey: env('OPENWEATHERMAP_API_KEY'),
    baseUrl: env('OPENWEATHERMAP_BASE_URL'),
    cityListUrl: env('OPENWEATHERMAP_CITY_LIST_URL'),
    units: env('OPENWEATHERMAP_UNITS'),
    lang: env('OPENWEATHERMAP_LANG'),
    timeoutMs: env('OPENWEATHERMAP_TIMEOUT_MS'),
  });
}
