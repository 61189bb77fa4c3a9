import { z } from 'zod';
import { unitsSchema } from '../../config/index.js';
import { ValidationError } from '../../utils/errors.js';

export const MAX_GROUP_SIZE = 20;
export const MAX_CIRCLE_COUNT = 50;
export const DEFAULT_CIRCLE_COUNT = 10;

const nonEmpty = (label: string) =>
  z.string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .trim()
    .min(1, `${label} must not be empty`);

// A single id; commas would let one argument expand into several ids on the wire.
export const cityIdSchema = z
  .union(
    [
      z.string().trim().min(1, 'City id must not be empty').regex(/^[^,]+$/, 'City id must not contain commas'),
      z.number().int().nonnegative().safe(),
    ],
    {
      errorMap: () => ({ message: 'City id must be a non-empty string or a non-negative integer' }),
    }
  )
  .transform((value) => String(value));

export const cityNameSchema = nonEmpty('City name');
export const zipCodeSchema = nonEmpty('Zip code');
export const countryCodeSchema = nonEmpty('Country code');

/** Six decimals, never exponent notation (`1e-7` becomes `0`). */
export function formatCoordinate(value: number): string {
  return String(Number(value.toFixed(6)));
}

export const latitudeSchema = z
  .number({ required_error: 'Latitude is required', invalid_type_error: 'Latitude must be a number' })
  .finite()
  .min(-90)
  .max(90)
  .transform(formatCoordinate);

export const longitudeSchema = z
  .number({ required_error: 'Longitude is required', invalid_type_error: 'Longitude must be a number' })
  .finite()
  .min(-180)
  .max(180)
  .transform(formatCoordinate);

export const searchTypeSchema = z.enum(['like', 'accurate']).optional();
export const clusterSchema = z.enum(['yes', 'no']).optional();
export const pollutantSchema = z.enum(['co', 'o3', 'so2', 'no2']);

const boxVertexSchema = z.number().finite().transform(formatCoordinate);

export const boxSchema = z.tuple([boxVertexSchema, boxVertexSchema, boxVertexSchema, boxVertexSchema]);
export const zoomSchema = z.number().finite();

export const groupSchema = z
  .array(cityIdSchema)
  .min(1, 'At least one city id is required')
  .max(MAX_GROUP_SIZE, `The limit of locations is ${MAX_GROUP_SIZE}`);

export const dateSchema = z.date({ invalid_type_error: 'Expected a valid Date' });

// `current`, or an ISO 8601 UTC instant truncated anywhere from seconds down to the year.
export const datetimeSchema = z
  .string()
  .regex(/^(current|\d{4}(-\d{2}(-\d{2}(T\d{2}(:\d{2}(:\d{2})?)?)?)?)?Z)$/, 'Expected "current" or an ISO 8601 UTC date')
  .default('current');

export const countSchema = z
  .number()
  .finite()
  .default(DEFAULT_CIRCLE_COUNT)
  .transform((value) => Math.max(0, Math.min(Math.trunc(value), MAX_CIRCLE_COUNT)));

export const overridesSchema = z.object({
  units: unitsSchema.optional(),
  lang: z.string().trim().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/** Parses a call argument, turning schema failures into a ValidationError. */
export function parseArgument<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(`Invalid ${label}: ${detail}`);
  }
  return result.data;
}
