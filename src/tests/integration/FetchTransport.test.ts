import { createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { FetchTransport } from '../../adapters/http/FetchTransport.js';
import { OpenWeatherMapClient } from '../../core/client/OpenWeatherMapClient.js';
import { NotFoundError, TransportError } from '../../utils/errors.js';

describe('FetchTransport', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the status and raw body', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"cod":200}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const transport = new FetchTransport();

    const response = await transport.get({ url: new URL('https://api.example.test/data'), timeoutMs: 1000 });

    expect(response.status).toBe(200);
    expect(new TextDecoder().decode(response.body)).toBe('{"cod":200}');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://api.example.test/data');
    expect(init).toMatchObject({ method: 'GET', headers: { Accept: 'application/json' } });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('reports timeouts as TransportError', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const transport = new FetchTransport(vi.fn().mockRejectedValue(timeout));

    const error = await transport
      .get({ url: new URL('https://api.example.test/data'), timeoutMs: 50 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Request timed out after 50ms', cause: timeout });
  });

  it('reports connection failures as TransportError', async () => {
    const refused = new TypeError('fetch failed');
    const transport = new FetchTransport(vi.fn().mockRejectedValue(refused));

    const error = await transport
      .get({ url: new URL('https://api.example.test/data'), timeoutMs: 1000 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Connection to the weather API failed', cause: refused });
  });

  it('lets the client map provider errors end to end', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response(JSON.stringify({ cod: '404', message: 'city not found' }), { status: 404 }))
    );
    const client = new OpenWeatherMapClient('test-key');

    const error = await client.getCurrentWeatherByCityId('0').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ status: 404, providerMessage: 'city not found' });
  });

  it('lets the client decode a successful response end to end', async () => {
    const payload = { cod: '200', cnt: 1, list: [{ dt: 1700000000, main: { temp: 280.1 } }] };
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify(payload), { status: 200 }));
    const client = new OpenWeatherMapClient('test-key', { transport: new FetchTransport(fetchMock) });

    const result = await client.getForecastByCityId('2988507', { units: 'standard', params: { cnt: 1 } });

    expect(result).toEqual(payload);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://api.openweathermap.org/data/2.5/forecast?appid=test-key&id=2988507&units=standard&cnt=1'
    );
  });

  describe('against a server that never answers', () => {
    // Accepts connections and reads requests, but never writes a response.
    const server = createServer(() => {});
    let port = 0;

    beforeAll(async () => {
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
      port = (server.address() as AddressInfo).port;
    });

    afterAll(async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    });

    it('aborts the real fetch once the timeout elapses', async () => {
      const transport = new FetchTransport();

      const error = await transport
        .get({ url: new URL(`http://127.0.0.1:${port}/data`), timeoutMs: 200 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'Request timed out after 200ms' });
    });
  });
});
