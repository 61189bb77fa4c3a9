import { loadConfig, parseClientConfig } from '../../config/index.js';
import type { ClientConfig, ClientConfigInput, Units } from '../../config/index.js';
import { FetchTransport } from '../../adapters/http/FetchTransport.js';
import type { HttpResponse, HttpTransportPort } from '../../ports/HttpTransportPort.js';
import type {
  AirPollutionOptions,
  BoundingBox,
  BoxOptions,
  CircleOptions,
  CityId,
  CityNameOptions,
  JsonValue,
  Pollutant,
  RequestOptions,
  ServiceInfo,
  TimeoutOptions,
  WeatherPort,
} from '../../ports/WeatherPort.js';
import { TransportError, ValidationError } from '../../utils/errors.js';
import { createLogger, generateRequestId } from '../../utils/logger.js';
import {
  boxSchema,
  cityIdSchema,
  cityNameSchema,
  clusterSchema,
  countSchema,
  countryCodeSchema,
  dateSchema,
  datetimeSchema,
  groupSchema,
  latitudeSchema,
  longitudeSchema,
  overridesSchema,
  parseArgument,
  pollutantSchema,
  searchTypeSchema,
  zipCodeSchema,
  zoomSchema,
} from './arguments.js';
import { buildQuery, redactUrl, scrubSecret } from './query.js';
import type { LocationParams } from './query.js';
import { decodeGzipJson, decodeJson, errorForStatus, extractProviderMessage, isSuccess } from './responses.js';
import { POLLUTANT_SERVICES, SERVICES, buildServiceUrl } from './services.js';
import type { ServiceName } from './services.js';

export interface ClientOptions extends Omit<ClientConfigInput, 'apiKey'> {
  transport?: HttpTransportPort;
}

export interface ClientDefaults {
  baseUrl: string;
  cityListUrl: string;
  units: Units;
  lang?: string;
  timeoutMs: number;
}

/**
 * Client for the OpenWeatherMap HTTP API.
 *
 * Every operation validates its arguments, performs exactly one GET and
 * resolves with the decoded JSON body, or rejects with an ApiError subclass
 * matching the HTTP status. Nothing is retried. The instance only holds frozen
 * configuration, so it can be shared between concurrent calls.
 */
export class OpenWeatherMapClient implements WeatherPort {
  private readonly logger = createLogger({ client: 'OpenWeatherMapClient' });
  private readonly config: Readonly<ClientConfig>;
  private readonly transport: HttpTransportPort;

  constructor(apiKey: string, options: ClientOptions = {}) {
    const { transport, ...settings } = options;
    this.config = parseClientConfig({ ...settings, apiKey });
    this.transport = transport ?? new FetchTransport();

    this.logger.debug(
      { baseUrl: this.config.baseUrl, units: this.config.units, lang: this.config.lang },
      'OpenWeatherMap client initialized'
    );
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, transport?: HttpTransportPort): OpenWeatherMapClient {
    const { apiKey, ...settings } = loadConfig(env);
    return new OpenWeatherMapClient(apiKey, { ...settings, transport });
  }

  /** Client-level defaults, without the API key. */
  get defaults(): Readonly<ClientDefaults> {
    const { baseUrl, cityListUrl, units, lang, timeoutMs } = this.config;
    return Object.freeze({ baseUrl, cityListUrl, units, lang, timeoutMs });
  }

  get availableServices(): Readonly<Record<ServiceName, ServiceInfo>> {
    return SERVICES;
  }

  // Current weather

  async getCurrentWeatherByCityId(cityId: CityId, options: RequestOptions = {}): Promise<JsonValue> {
    const id = parseArgument(cityIdSchema, cityId, 'city id');
    return this.fetchService('currentWeather', [['id', id]], options);
  }

  async getCurrentWeatherByCityName(cityName: string, options: CityNameOptions = {}): Promise<JsonValue> {
    return this.fetchService('currentWeather', cityNameLocation(cityName, options), options);
  }

  async getCurrentWeatherByCoordinates(
    latitude: number,
    longitude: number,
    options: RequestOptions = {}
  ): Promise<JsonValue> {
    return this.fetchService('currentWeather', coordinatesLocation(latitude, longitude), options);
  }

  async getCurrentWeatherByZipCode(
    zipCode: string,
    countryCode: string,
    options: RequestOptions = {}
  ): Promise<JsonValue> {
    return this.fetchService('currentWeather', zipCodeLocation(zipCode, countryCode), options);
  }

  async getCurrentWeatherWithinBox(box: BoundingBox, zoom: number, options: BoxOptions = {}): Promise<JsonValue> {
    const vertices = parseArgument(boxSchema, box, 'box');
    const zoomLevel = parseArgument(zoomSchema, zoom, 'zoom');
    const cluster = parseArgument(clusterSchema, options.cluster, 'cluster');

    const location: LocationParams = [['bbox', [...vertices, zoomLevel].join(',')]];
    if (cluster !== undefined) {
      location.push(['cluster', cluster]);
    }
    return this.fetchService('currentWeatherBox', location, options);
  }

  async getCurrentWeatherWithinCircle(
    latitude: number,
    longitude: number,
    options: CircleOptions = {}
  ): Promise<JsonValue> {
    const location = coordinatesLocation(latitude, longitude);
    const count = parseArgument(countSchema, options.count, 'count');
    const cluster = parseArgument(clusterSchema, options.cluster, 'cluster');

    location.push(['cnt', count]);
    if (cluster !== undefined) {
      location.push(['cluster', cluster]);
    }
    return this.fetchService('currentWeatherCircle', location, options);
  }

  /** Each id in the group counts as one call against the provider's quota. */
  async getCurrentWeatherForGroup(cityIds: CityId[], options: RequestOptions = {}): Promise<JsonValue> {
    const ids = parseArgument(groupSchema, cityIds, 'city ids');
    return this.fetchService('currentWeatherGroup', [['id', ids.join(',')]], options);
  }

  // 5 day / 3 hour forecast

  async getForecastByCityId(cityId: CityId, options: RequestOptions = {}): Promise<JsonValue> {
    const id = parseArgument(cityIdSchema, cityId, 'city id');
    return this.fetchService('forecast5d', [['id', id]], options);
  }

  async getForecastByCityName(cityName: string, options: CityNameOptions = {}): Promise<JsonValue> {
    return this.fetchService('forecast5d', cityNameLocation(cityName, options), options);
  }

  async getForecastByCoordinates(latitude: number, longitude: number, options: RequestOptions = {}): Promise<JsonValue> {
    return this.fetchService('forecast5d', coordinatesLocation(latitude, longitude), options);
  }

  async getForecastByZipCode(zipCode: string, countryCode: string, options: RequestOptions = {}): Promise<JsonValue> {
    return this.fetchService('forecast5d', zipCodeLocation(zipCode, countryCode), options);
  }

  // UV index

  async getUvIndex(latitude: number, longitude: number, options: TimeoutOptions = {}): Promise<JsonValue> {
    return this.fetchService('uvIndexCurrent', coordinatesLocation(latitude, longitude), {
      timeoutMs: options.timeoutMs,
    });
  }

  async getUvIndexForecast(latitude: number, longitude: number, options: TimeoutOptions = {}): Promise<JsonValue> {
    return this.fetchService('uvIndexForecast', coordinatesLocation(latitude, longitude), {
      timeoutMs: options.timeoutMs,
    });
  }

  async getUvIndexHistory(
    latitude: number,
    longitude: number,
    start: Date,
    end: Date,
    options: TimeoutOptions = {}
  ): Promise<JsonValue> {
    const location = coordinatesLocation(latitude, longitude);
    const from = parseArgument(dateSchema, start, 'start date');
    const to = parseArgument(dateSchema, end, 'end date');
    if (from.getTime() > to.getTime()) {
      throw new ValidationError('Invalid period: start date is after end date');
    }

    location.push(['start', toUnixSeconds(from)], ['end', toUnixSeconds(to)]);
    return this.fetchService('uvIndexHistorical', location, { timeoutMs: options.timeoutMs });
  }

  // Air pollution

  async getAirPollution(
    pollutant: Pollutant,
    latitude: number,
    longitude: number,
    options: AirPollutionOptions = {}
  ): Promise<JsonValue> {
    const service = POLLUTANT_SERVICES[parseArgument(pollutantSchema, pollutant, 'pollutant')];
    const lat = parseArgument(latitudeSchema, latitude, 'latitude');
    const lon = parseArgument(longitudeSchema, longitude, 'longitude');
    const datetime = parseArgument(datetimeSchema, options.datetime, 'datetime');

    return this.fetchService(service, [], { timeoutMs: options.timeoutMs }, `/${lat},${lon}/${datetime}.json`);
  }

  // Bulk city list

  /** Downloads the gzipped list of every city the provider knows, with its id. */
  async getCityList(options: TimeoutOptions = {}): Promise<JsonValue> {
    const { timeoutMs } = parseArgument(overridesSchema, { timeoutMs: options.timeoutMs }, 'request options');
    const url = new URL(this.config.cityListUrl);
    return this.send(url, timeoutMs ?? this.config.timeoutMs, { service: 'cityList' }, decodeGzipJson);
  }

  private async fetchService(
    name: ServiceName,
    location: LocationParams,
    options: RequestOptions,
    pathSuffix?: string
  ): Promise<JsonValue> {
    const service: ServiceInfo = SERVICES[name];
    const overrides = parseArgument(
      overridesSchema,
      { units: options.units, lang: options.lang, timeoutMs: options.timeoutMs },
      'request options'
    );

    const url = buildServiceUrl(this.config.baseUrl, service.path, pathSuffix);
    const query = buildQuery({
      apiKey: this.config.apiKey,
      location,
      localization: service.localized
        ? { units: overrides.units ?? this.config.units, lang: overrides.lang ?? this.config.lang }
        : undefined,
      extra: options.params,
    });
    url.search = query.toString();

    return this.send(url, overrides.timeoutMs ?? this.config.timeoutMs, { service: name }, decodeJson);
  }

  private async send<T>(
    url: URL,
    timeoutMs: number,
    context: Record<string, unknown>,
    decode: (response: HttpResponse) => T
  ): Promise<T> {
    const logger = this.logger.child({ ...context, requestId: generateRequestId() });
    const safeUrl = redactUrl(url);
    logger.debug({ url: safeUrl, timeoutMs }, 'Sending request');

    let response: HttpResponse;
    try {
      response = await this.transport.get({ url, timeoutMs });
    } catch (error) {
      const failure = this.toTransportError(error);
      logger.error({ url: safeUrl, error: failure.message }, 'Weather API request failed');
      throw failure;
    }

    if (!isSuccess(response.status)) {
      const providerMessage = extractProviderMessage(response.body);
      const failure = errorForStatus(
        response.status,
        providerMessage === undefined ? undefined : scrubSecret(providerMessage, this.config.apiKey)
      );
      logger.error({ url: safeUrl, status: response.status, kind: failure.kind }, 'Weather API returned an error');
      throw failure;
    }

    try {
      const data = decode(response);
      logger.debug({ status: response.status }, 'Response decoded');
      return data;
    } catch (error) {
      logger.error({ url: safeUrl, status: response.status, error }, 'Weather API response could not be decoded');
      throw error;
    }
  }

  private toTransportError(error: unknown): TransportError {
    const { apiKey } = this.config;
    if (error instanceof TransportError && !error.message.includes(apiKey)) {
      return error;
    }
    const message = error instanceof Error ? scrubSecret(error.message, apiKey) : 'HTTP transport failed';
    const status = error instanceof TransportError ? error.status : undefined;
    return new TransportError(message, { status }, { cause: error });
  }
}

function cityNameLocation(cityName: string, options: CityNameOptions): LocationParams {
  const name = parseArgument(cityNameSchema, cityName, 'city name');
  const country =
    options.countryCode === undefined ? undefined : parseArgument(countryCodeSchema, options.countryCode, 'country code');
  const searchType = parseArgument(searchTypeSchema, options.searchType, 'search type');

  const location: LocationParams = [['q', country === undefined ? name : `${name},${country}`]];
  if (searchType !== undefined) {
    location.push(['type', searchType]);
  }
  return location;
}

function coordinatesLocation(latitude: number, longitude: number): LocationParams {
  const lat = parseArgument(latitudeSchema, latitude, 'latitude');
  const lon = parseArgument(longitudeSchema, longitude, 'longitude');
  return [
    ['lat', lat],
    ['lon', lon],
  ];
}

function zipCodeLocation(zipCode: string, countryCode: string): LocationParams {
  const zip = parseArgument(zipCodeSchema, zipCode, 'zip code');
  const country = parseArgument(countryCodeSchema, countryCode, 'country code');
  return [['zip', `${zip},${country}`]];
}

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
