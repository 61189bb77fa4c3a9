import { describe, it, expect } from 'vitest';
import { DEFAULT_BASE_URL, DEFAULT_CITY_LIST_URL, loadConfig, parseClientConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults for unset and empty variables', () => {
    const config = loadConfig({
      OPENWEATHERMAP_API_KEY: 'test-key',
      OPENWEATHERMAP_BASE_URL: '',
      OPENWEATHERMAP_LANG: '',
    });

    expect(config).toEqual({
      apiKey: 'test-key',
      baseUrl: DEFAULT_BASE_URL,
      cityListUrl: DEFAULT_CITY_LIST_URL,
      units: 'metric',
      timeoutMs: 10000,
    });
  });

  it('reads every supported variable', () => {
    const config = loadConfig({
      OPENWEATHERMAP_API_KEY: 'test-key',
      OPENWEATHERMAP_BASE_URL: 'http://localhost:8080',
      OPENWEATHERMAP_CITY_LIST_URL: 'http://localhost:8080/cities.json.gz',
      OPENWEATHERMAP_UNITS: 'imperial',
      OPENWEATHERMAP_LANG: 'pt_br',
      OPENWEATHERMAP_TIMEOUT_MS: '2500',
    });

    expect(config).toEqual({
      apiKey: 'test-key',
      baseUrl: 'http://localhost:8080',
      cityListUrl: 'http://localhost:8080/cities.json.gz',
      units: 'imperial',
      lang: 'pt_br',
      timeoutMs: 2500,
    });
  });

  it('fails without an API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it('reports each invalid variable', () => {
    expect(() =>
      loadConfig({ OPENWEATHERMAP_API_KEY: 'test-key', OPENWEATHERMAP_UNITS: 'kelvin', OPENWEATHERMAP_TIMEOUT_MS: '-5' })
    ).toThrow(/units: .*\n.*timeoutMs: /);
  });
});

describe('parseClientConfig', () => {
  it('returns a frozen config', () => {
    const config = parseClientConfig({ apiKey: 'test-key', units: 'standard' });
    expect(Object.isFrozen(config)).toBe(true);
    expect(config.units).toBe('standard');
  });
});
