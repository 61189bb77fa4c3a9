import type { ServiceInfo } from '../../ports/WeatherPort.js';

const DATA_VERSION = '2.5';
const POLLUTION_VERSION = 'v1';

export const SERVICES = {
  forecast5d: {
    path: `/data/${DATA_VERSION}/forecast`,
    description: 'Forecast 5 day / 3 hour for a location.',
    localized: true,
  },
  currentWeather: {
    path: `/data/${DATA_VERSION}/weather`,
    description: 'Current weather for a location.',
    localized: true,
  },
  currentWeatherBox: {
    path: `/data/${DATA_VERSION}/box/city`,
    description: 'Current weather within a geographical box.',
    localized: true,
  },
  currentWeatherCircle: {
    path: `/data/${DATA_VERSION}/find`,
    description: 'Current weather within a geographical circle.',
    localized: true,
  },
  currentWeatherGroup: {
    path: `/data/${DATA_VERSION}/group`,
    description: 'Current weather for a group of cities.',
    localized: true,
  },
  airPollutionCarbonMonoxide: {
    path: `/pollution/${POLLUTION_VERSION}/co`,
    description: 'Carbon monoxide for a location and time.',
    localized: false,
  },
  airPollutionOzone: {
    path: `/pollution/${POLLUTION_VERSION}/o3`,
    description: 'Ozone for a location and time.',
    localized: false,
  },
  airPollutionSulfurDioxide: {
    path: `/pollution/${POLLUTION_VERSION}/so2`,
    description: 'Sulfur dioxide for a location and time.',
    localized: false,
  },
  airPollutionNitrogenDioxide: {
    path: `/pollution/${POLLUTION_VERSION}/no2`,
    description: 'Nitrogen dioxide for a location and time.',
    localized: false,
  },
  uvIndexCurrent: {
    path: `/data/${DATA_VERSION}/uvi`,
    description: 'UV index for a location.',
    localized: false,
  },
  uvIndexForecast: {
    path: `/data/${DATA_VERSION}/uvi/forecast`,
    description: 'Forecast UV index for a location.',
    localized: false,
  },
  uvIndexHistorical: {
    path: `/data/${DATA_VERSION}/uvi/history`,
    description: 'Historical UV index for a location.',
    localized: false,
  },
} as const satisfies Record<string, ServiceInfo>;

export type ServiceName = keyof typeof SERVICES;

export const POLLUTANT_SERVICES = {
  co: 'airPollutionCarbonMonoxide',
  o3: 'airPollutionOzone',
  so2: 'airPollutionSulfurDioxide',
  no2: 'airPollutionNitrogenDioxide',
} as const satisfies Record<string, ServiceName>;

export function buildServiceUrl(baseUrl: string, path: string, suffix?: string): URL {
  const root = baseUrl.replace(/\/+$/, '');
  return new URL(`${root}${path}${suffix ?? ''}`);
}
