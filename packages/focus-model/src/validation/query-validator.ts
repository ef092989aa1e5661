/**
 * Query Validation
 *
 * Zod schemas for focus model queries. Everything a caller passes is checked
 * here, before a request body is ever built.
 */

import { z } from 'zod';
import {
  CAMERAS,
  DEFAULT_FORMAT,
  FIRST_TELEMETRY_YEAR,
  OUTPUT_FORMATS,
  type Camera,
  type OutputFormat,
} from '../core/constants.js';
import { InvalidParameterError } from '../core/errors.js';
import type { QueryInput, QueryParameters } from '../core/types.js';
import { isValidCalendarDay, parseClock } from '../core/utils/time.js';

// ============================================================================
// Field Schemas
// ============================================================================

export const CameraSchema = z.enum(CAMERAS, {
  errorMap: () => ({ message: `Camera must be one of: ${CAMERAS.join(', ')}` }),
});

export const OutputFormatSchema = z.enum(OUTPUT_FORMATS, {
  errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
});

/**
 * MM/DD; the calendar check needs the year and runs on the whole query
 */
export const DateSchema = z.string().regex(/^\d{2}\/\d{2}$/, 'Date must be in MM/DD format');

/**
 * 24-hour HH:MM
 */
export const TimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Time must be in 24-hour HH:MM format');

function createYearSchema(now: Date) {
  const lastYear = now.getUTCFullYear();

  return z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .regex(/^\d{4}$/, 'Year must be a 4-digit number')
        .transform(Number),
    ])
    .pipe(
      z
        .number()
        .int('Year must be an integer')
        .min(FIRST_TELEMETRY_YEAR, `Year must be ${FIRST_TELEMETRY_YEAR} or later (start of telemetry)`)
        .max(lastYear, `Year must not be after ${lastYear}`)
    );
}

/**
 * Full query schema
 *
 * `now` bounds the year; it is a parameter so tests can pin the clock.
 */
export function createQuerySchema(now: Date = new Date()) {
  return z
    .object({
      year: createYearSchema(now),
      date: DateSchema,
      startTime: TimeSchema,
      endTime: TimeSchema,
      camera: CameraSchema,
      format: OutputFormatSchema,
    })
    .superRefine((query, ctx) => {
      const [month, day] = query.date.split('/').map(Number);
      if (!isValidCalendarDay(query.year, month, day)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['date'],
          message: `${query.date} is not a valid date in ${query.year}`,
        });
      }

      const start = parseClock(query.startTime) ?? 0;
      const end = parseClock(query.endTime) ?? 0;
      if (end < start) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['endTime'],
          message: `End time ${query.endTime} is before start time ${query.startTime}`,
        });
      }
    });
}

// ============================================================================
// Validation Entry Point
// ============================================================================

export interface ValidateQueryOptions {
  /** Camera used when the query has none */
  readonly defaultCamera: Camera;
  /** Reference clock for the year upper bound (default: now) */
  readonly now?: Date;
}

/**
 * Validate a caller query and fill in defaults
 *
 * @throws {InvalidParameterError} Listing every problem found
 */
export function validateQuery(input: QueryInput, options: ValidateQueryOptions): QueryParameters {
  const result = createQuerySchema(options.now).safeParse({
    year: input.year,
    date: input.date,
    startTime: input.startTime,
    endTime: input.endTime,
    camera: input.camera ?? options.defaultCamera,
    format: input.format ?? DEFAULT_FORMAT,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new InvalidParameterError(
      `Invalid focus model query: ${issues.map((issue) => issue.message).join('; ')}`,
      issues
    );
  }

  return result.data;
}

/**
 * Narrow an arbitrary string to a camera identifier
 *
 * @throws {InvalidParameterError} For unknown identifiers
 */
export function parseCamera(value: string): Camera {
  const result = CameraSchema.safeParse(value.toUpperCase());
  if (!result.success) {
    throw new InvalidParameterError(`Unknown camera: ${value}`, [
      { path: 'camera', message: result.error.issues[0]?.message ?? 'Unknown camera' },
    ]);
  }
  return result.data;
}

/**
 * Narrow a user-supplied format name; TXT is accepted for TEXT
 *
 * @throws {InvalidParameterError} For unknown formats
 */
export function parseOutputFormat(value: string): OutputFormat {
  const normalised = value.toUpperCase() === 'TXT' ? 'TEXT' : value.toUpperCase();
  const result = OutputFormatSchema.safeParse(normalised);
  if (!result.success) {
    throw new InvalidParameterError(`Unknown output format: ${value}`, [
      { path: 'format', message: result.error.issues[0]?.message ?? 'Unknown format' },
    ]);
  }
  return result.data;
}
