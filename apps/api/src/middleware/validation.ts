import {movieStatuses} from '@theater/database';
import {z} from 'zod';
import type {FieldError} from '../types/errors';
import {formatZodErrors} from '../utils/error-handlers';

export const RELEASE_HORIZON_DAYS = 365;
export const MAX_PER_PAGE = 20;
export const DEFAULT_PER_PAGE = 10;

/** Latest release date accepted today, as a UTC `YYYY-MM-DD` string. */
export function latestAllowedReleaseDate(now = new Date()): string {
  const limit = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate() + RELEASE_HORIZON_DAYS,
    ),
  );
  return limit.toISOString().slice(0, 10);
}

const movieName = z
  .string()
  .min(1, 'Name is required')
  .max(255, 'Name must be at most 255 characters');

// ISO dates compare correctly as strings.
const releaseDate = z
  .string()
  .date('Date must be a valid YYYY-MM-DD date')
  .refine(
    value => value <= latestAllowedReleaseDate(),
    'Movie date cannot be more than 1 year in the future',
  );

const score = z
  .number()
  .finite('Must be a finite number')
  .min(0, 'Score must be between 0 and 100')
  .max(100, 'Score must be between 0 and 100');

const amount = z
  .number()
  .finite('Must be a finite number')
  .min(0, 'Must be greater than or equal to 0');

// Names are stored exactly as sent.
const lookupNames = z.array(z.string().min(1, 'Name is required'));

export const movieCreateSchema = z.object({
  name: movieName,
  date: releaseDate,
  score,
  overview: z.string(),
  status: z.enum(movieStatuses),
  budget: amount,
  revenue: amount,
  country: z
    .string()
    .regex(/^[A-Z]{2,3}$/, 'Country code must be 2 or 3 uppercase letters'),
  genres: lookupNames,
  actors: lookupNames,
  languages: lookupNames,
});

export const movieUpdateSchema = z.object({
  name: movieName.optional(),
  date: releaseDate.optional(),
  score: score.optional(),
  overview: z.string().optional(),
  status: z.enum(movieStatuses).optional(),
  budget: amount.optional(),
  revenue: amount.optional(),
});

export const movieListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_PER_PAGE)
    .default(DEFAULT_PER_PAGE),
});

export const movieIdSchema = z.coerce
  .number()
  .int()
  .positive('Movie id must be a positive integer');

export type ValidationResult<T> =
  | {success: true; data: T}
  | {success: false; errors: FieldError[]};

function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  field?: string,
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return {success: true, data: result.data};
  }

  const errors = formatZodErrors(result.error);
  return {
    success: false,
    errors: field
      ? errors.map(error => ({...error, field}))
      : errors,
  };
}

export const validateMovieCreate = (input: unknown) =>
  validateWith(movieCreateSchema, input);

export const validateMovieUpdate = (input: unknown) =>
  validateWith(movieUpdateSchema, input);

export const validateMovieListQuery = (input: unknown) =>
  validateWith(movieListQuerySchema, input);

export const validateMovieId = (input: unknown) =>
  validateWith(movieIdSchema, input, 'id');

export async function parseJsonBody(request: {
  json: () => Promise<unknown>;
}): Promise<ValidationResult<unknown>> {
  try {
    return {success: true, data: await request.json()};
  } catch {
    return {
      success: false,
      errors: [{field: 'body', message: 'Request body must be valid JSON'}],
    };
  }
}
