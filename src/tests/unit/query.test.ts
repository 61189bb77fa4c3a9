import { describe, it, expect } from 'vitest';
import { buildQuery, redactUrl, scrubSecret } from '../../core/client/query.js';
import { buildServiceUrl } from '../../core/client/services.js';
import { ValidationError } from '../../utils/errors.js';

describe('buildQuery', () => {
  it('orders the key, location, units, lang and extras', () => {
    const query = buildQuery({
      apiKey: 'test-key',
      location: [['id', '2988507']],
      localization: { units: 'metric', lang: 'fr' },
      extra: { cnt: 8, mode: 'json' },
    });

    expect(query.toString()).toBe('appid=test-key&id=2988507&units=metric&lang=fr&cnt=8&mode=json');
  });

  it('omits lang when none is configured', () => {
    const query = buildQuery({
      apiKey: 'test-key',
      location: [['q', 'Berlin']],
      localization: { units: 'standard' },
    });

    expect(query.toString()).toBe('appid=test-key&q=Berlin&units=standard');
  });

  it('omits units and lang for endpoints without localization', () => {
    const query = buildQuery({
      apiKey: 'test-key',
      location: [
        ['lat', 10.5],
        ['lon', -3],
      ],
    });

    expect(query.toString()).toBe('appid=test-key&lat=10.5&lon=-3');
  });

  it.each([['appid'], ['lat'], ['zip'], ['bbox'], ['lang']])('refuses to let extras override %s', (key) => {
    expect(() =>
      buildQuery({
        apiKey: 'test-key',
        location: [['id', '1']],
        localization: { units: 'metric', lang: 'en' },
        extra: { [key]: 'x' },
      })
    ).toThrow(ValidationError);
  });
});

describe('redactUrl', () => {
  it('masks the API key', () => {
    const url = new URL('https://api.openweathermap.org/data/2.5/weather?appid=test-key&id=1');
    expect(redactUrl(url)).toBe('https://api.openweathermap.org/data/2.5/weather?appid=***&id=1');
    expect(url.searchParams.get('appid')).toBe('test-key');
  });

  it('leaves URLs without a key alone', () => {
    const url = new URL('https://bulk.openweathermap.org/sample/city.list.json.gz');
    expect(redactUrl(url)).toBe('https://bulk.openweathermap.org/sample/city.list.json.gz');
  });
});

describe('scrubSecret', () => {
  it('replaces every occurrence of the secret', () => {
    expect(scrubSecret('key test-key and test-key again', 'test-key')).toBe('key *** and *** again');
  });
});

describe('buildServiceUrl', () => {
  it('appends the path and suffix to the base url', () => {
    expect(buildServiceUrl('https://api.openweathermap.org', '/pollution/v1/co', '/1,2/current.json').toString()).toBe(
      'https://api.openweathermap.org/pollution/v1/co/1,2/current.json'
    );
  });
});
