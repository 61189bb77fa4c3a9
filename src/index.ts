export { OpenWeatherMapClient } from './core/client/OpenWeatherMapClient.js';
export type { ClientDefaults, ClientOptions } from './core/client/OpenWeatherMapClient.js';
export { SERVICES } from './core/client/services.js';
export type { ServiceName } from './core/client/services.js';
export { FetchTransport } from './adapters/http/FetchTransport.js';
export type { FetchLike } from './adapters/http/FetchTransport.js';
export {
  DEFAULT_BASE_URL,
  DEFAULT_CITY_LIST_URL,
  DEFAULT_TIMEOUT_MS,
  loadConfig,
  parseClientConfig,
} from './config/index.js';
export type { ClientConfig, ClientConfigInput, Units } from './config/index.js';
export type { HttpRequest, HttpResponse, HttpTransportPort } from './ports/HttpTransportPort.js';
export type {
  AirPollutionOptions,
  BoundingBox,
  BoxOptions,
  CircleOptions,
  CityId,
  CityNameOptions,
  Cluster,
  JsonValue,
  Pollutant,
  QueryValue,
  RequestOptions,
  SearchType,
  ServiceInfo,
  TimeoutOptions,
  WeatherPort,
} from './ports/WeatherPort.js';
export {
  AccessLimitationError,
  ApiError,
  AuthenticationError,
  BadRequestError,
  ConfigError,
  NotFoundError,
  ServerError,
  TransportError,
  ValidationError,
  WeatherClientError,
} from './utils/errors.js';
export type { ApiErrorDetails, ApiErrorKind } from './utils/errors.js';
export { createLogger } from './utils/logger.js';
