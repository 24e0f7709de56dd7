import { z } from 'zod';
import { ValidationError } from '../shared/errors';
import { isValidTimeZone } from '../shared/calendar';
import { ENERGY_BUCKETS, MOOD_BUCKETS } from '../shared/types';
import { MAX_KEYWORD_CHARS, isValidUUID } from '../shared/validation';

// Inputs longer than this are rejected outright; stored text is cut to 1000
const MAX_RAW_TEXT_CHARS = 10_000;

const optionalText = z
  .string()
  .max(MAX_RAW_TEXT_CHARS)
  .nullish()
  .transform((value) => value ?? undefined);

export const subjectParamsSchema = z.object({
  subjectId: z.string().refine(isValidUUID, 'Invalid subject id'),
});

export const checkInBodySchema = z.object({
  painLevel: z.number().finite(),
  energyBucket: z.enum(ENERGY_BUCKETS).nullish().transform((value) => value ?? undefined),
  moodBucket: z.enum(MOOD_BUCKETS).nullish().transform((value) => value ?? undefined),
  symptomsText: optionalText,
  concernsText: optionalText,
  teamNote: optionalText,
});

const timeZone = z.string().refine(isValidTimeZone, 'Unknown time zone');

export const historyQuerySchema = z.object({
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  // Longer keywords are trimmed by the history source, not rejected
  keyword: z.string().max(MAX_KEYWORD_CHARS * 10).optional(),
  limit: z.coerce.number().int().min(0).max(1000).default(100),
});

export const trendsQuerySchema = z.object({
  windowDays: z.coerce.number().int().min(1).max(365).default(30),
  maxRecords: z.coerce.number().int().min(1).max(1000).default(250),
  timeZone: timeZone.optional(),
});

export const digestQuerySchema = z.object({
  overdueDays: z.coerce.number().int().min(0).max(365).default(3),
  maxPerSection: z.coerce.number().int().min(0).max(100).default(10),
  timeZone: timeZone.optional(),
});

/**
 * Parse request input, turning schema failures into a 400 ValidationError.
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const errors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join('.') : '_';
      (errors[field] ??= []).push(issue.message);
    }
    throw new ValidationError(errors);
  }
  return result.data;
}
