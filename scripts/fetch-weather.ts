/**
 * Prints the current weather and the 5 day forecast for a city id.
 * Run with: npx tsx scripts/fetch-weather.ts <cityId> [units] [lang]
 */
import 'dotenv/config';
import { OpenWeatherMapClient } from '../src/core/client/OpenWeatherMapClient.js';
import type { Units } from '../src/config/index.js';
import { ApiError } from '../src/utils/errors.js';

const UNITS: readonly Units[] = ['metric', 'imperial', 'standard'];

function parseUnits(value: string | undefined): Units | undefined {
  return UNITS.find((units) => units === value);
}

async function main(): Promise<void> {
  const [cityId, units, lang] = process.argv.slice(2);
  if (!cityId) {
    console.error('Usage: tsx scripts/fetch-weather.ts <cityId> [metric|imperial|standard] [lang]');
    process.exitCode = 1;
    return;
  }

  if (units !== undefined && parseUnits(units) === undefined) {
    console.error(`Unknown units "${units}", expected one of: ${UNITS.join(', ')}`);
    process.exitCode = 1;
    return;
  }

  const client = OpenWeatherMapClient.fromEnv();
  const options = { units: parseUnits(units), lang };

  const current = await client.getCurrentWeatherByCityId(cityId, options);
  console.log('=== CURRENT WEATHER ===');
  console.log(JSON.stringify(current, null, 2));

  const forecast = await client.getForecastByCityId(cityId, options);
  console.log('\n=== FORECAST (5 day / 3 hour) ===');
  console.log(JSON.stringify(forecast, null, 2));
}

main().catch((error: unknown) => {
  if (error instanceof ApiError) {
    console.error(`${error.name} (status ${error.status ?? 'n/a'}): ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
