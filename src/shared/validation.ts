/**
 * Validation and sanitization for check-in input
 */

import { type CheckInInput, PAIN_MAX, PAIN_MIN } from './types';

export const MAX_FREE_TEXT_CHARS = 1000;
export const MAX_KEYWORD_CHARS = 100;

/**
 * Validate UUID format
 */
export function isValidUUID(value: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
  return uuidRegex.test(value);
}

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Remove control characters (newlines and tabs are kept)
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = MAX_FREE_TEXT_CHARS): string {
  return input
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim()
    .substring(0, maxLength);
}

/**
 * Sanitized text, or undefined when nothing printable is left
 */
export function sanitizeOptionalText(
  input: string | null | undefined,
  maxLength: number = MAX_FREE_TEXT_CHARS
): string | undefined {
  if (input === null || input === undefined) {
    return undefined;
  }
  const cleaned = sanitizeInput(input, maxLength);
  return cleaned.length > 0 ? cleaned : undefined;
}

export function clampPain(value: number): number {
  if (!Number.isFinite(value)) {
    return PAIN_MIN;
  }
  return Math.min(PAIN_MAX, Math.max(PAIN_MIN, Math.round(value)));
}

/**
 * Copy of a check-in suitable for persistence: pain clamped to 0-10,
 * text trimmed, blank text dropped, text truncated.
 */
export function sanitizeCheckIn(input: CheckInInput): CheckInInput {
  const sanitized: CheckInInput = { painLevel: clampPain(input.painLevel) };

  if (input.energyBucket) sanitized.energyBucket = input.energyBucket;
  if (input.moodBucket) sanitized.moodBucket = input.moodBucket;

  const symptomsText = sanitizeOptionalText(input.symptomsText);
  const concernsText = sanitizeOptionalText(input.concernsText);
  const teamNote = sanitizeOptionalText(input.teamNote);

  if (symptomsText) sanitized.symptomsText = symptomsText;
  if (concernsText) sanitized.concernsText = concernsText;
  if (teamNote) sanitized.teamNote = teamNote;

  return sanitized;
}

/**
 * History search keyword: single line, whitespace collapsed, capped.
 */
export function normalizeKeyword(keyword: string | null | undefined): string | undefined {
  if (!keyword) {
    return undefined;
  }
  const collapsed = sanitizeInput(keyword, Number.MAX_SAFE_INTEGER).replace(/\s+/g, ' ');
  const capped = collapsed.substring(0, MAX_KEYWORD_CHARS).trim();
  return capped.length > 0 ? capped : undefined;
}
