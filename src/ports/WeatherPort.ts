import type { Units } from '../config/index.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type CityId = string | number;

export type QueryValue = string | number | boolean;

export interface RequestOptions {
  units?: Units;
  lang?: string;
  timeoutMs?: number;
  /** Extra provider query parameters, e.g. `{ cnt: 8 }`. */
  params?: Record<string, QueryValue>;
}

export type SearchType = 'like' | 'accurate';

export interface CityNameOptions extends RequestOptions {
  countryCode?: string; // ISO 3166
  searchType?: SearchType;
}

export type Cluster = 'yes' | 'no';

export interface BoxOptions extends RequestOptions {
  cluster?: Cluster;
}

export interface CircleOptions extends RequestOptions {
  cluster?: Cluster;
  /** Number of cities around the point; clamped to 0..50, default 10. */
  count?: number;
}

/** [left longitude, bottom latitude, right longitude, top latitude] */
export type BoundingBox = [number, number, number, number];

export type Pollutant = 'co' | 'o3' | 'so2' | 'no2';

export interface TimeoutOptions {
  timeoutMs?: number;
}

export interface AirPollutionOptions extends TimeoutOptions {
  /** ISO 8601 UTC date, possibly truncated (e.g. `2016-01-02Z`), or `current`. */
  datetime?: string;
}

export interface ServiceInfo {
  path: string;
  description: string;
  /** Whether `units` and `lang` are sent to this endpoint. */
  localized: boolean;
}

export interface WeatherPort {
  getCurrentWeatherByCityId(cityId: CityId, options?: RequestOptions): Promise<JsonValue>;
  getCurrentWeatherByCityName(cityName: string, options?: CityNameOptions): Promise<JsonValue>;
  getCurrentWeatherByCoordinates(latitude: number, longitude: number, options?: RequestOptions): Promise<JsonValue>;
  getCurrentWeatherByZipCode(zipCode: string, countryCode: string, options?: RequestOptions): Promise<JsonValue>;
  getCurrentWeatherWithinBox(box: BoundingBox, zoom: number, options?: BoxOptions): Promise<JsonValue>;
  getCurrentWeatherWithinCircle(latitude: number, longitude: number, options?: CircleOptions): Promise<JsonValue>;
  getCurrentWeatherForGroup(cityIds: CityId[], options?: RequestOptions): Promise<JsonValue>;

  getForecastByCityId(cityId: CityId, options?: RequestOptions): Promise<JsonValue>;
  getForecastByCityName(cityName: string, options?: CityNameOptions): Promise<JsonValue>;
  getForecastByCoordinates(latitude: number, longitude: number, options?: RequestOptions): Promise<JsonValue>;
  getForecastByZipCode(zipCode: string, countryCode: string, options?: RequestOptions): Promise<JsonValue>;

  getUvIndex(latitude: number, longitude: number, options?: TimeoutOptions): Promise<JsonValue>;
  getUvIndexForecast(latitude: number, longitude: number, options?: TimeoutOptions): Promise<JsonValue>;
  getUvIndexHistory(
    latitude: number,
    longitude: number,
    start: Date,
    end: Date,
    options?: TimeoutOptions
  ): Promise<JsonValue>;

  getAirPollution(
    pollutant: Pollutant,
    latitude: number,
    longitude: number,
    options?: AirPollutionOptions
  ): Promise<JsonValue>;

  getCityList(options?: TimeoutOptions): Promise<JsonValue>;
}
