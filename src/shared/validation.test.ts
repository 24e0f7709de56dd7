import { describe, expect, it } from 'vitest';
import {
  MAX_FREE_TEXT_CHARS,
  clampPain,
  isValidUUID,
  normalizeKeyword,
  sanitizeCheckIn,
  sanitizeInput,
} from './validation';

describe('validation', () => {
  it('recognises UUIDs', () => {
    expect(isValidUUID('0b0c8a34-5a7e-4a43-9d2f-6a3f1e2b9c10')).toBe(true);
    expect(isValidUUID('not-a-uuid')).toBe(false);
  });

  it('strips control characters but keeps line breaks and tabs', () => {
    expect(sanitizeInput('  a\u0000b\tc\nd\u0007  ')).toBe('ab\tc\nd');
  });

  it('truncates long input', () => {
    expect(sanitizeInput('x'.repeat(MAX_FREE_TEXT_CHARS + 50))).toHaveLength(MAX_FREE_TEXT_CHARS);
  });

  it('clamps and rounds pain levels', () => {
    expect(clampPain(-3)).toBe(0);
    expect(clampPain(14)).toBe(10);
    expect(clampPain(6.6)).toBe(7);
    expect(clampPain(Number.NaN)).toBe(0);
  });

  describe('sanitizeCheckIn', () => {
    it('drops blank text and keeps buckets', () => {
      expect(
        sanitizeCheckIn({
          painLevel: 11,
          moodBucket: 'good',
          symptomsText: '   ',
          concernsText: ' rides ',
        })
      ).toEqual({ painLevel: 10, moodBucket: 'good', concernsText: 'rides' });
    });
  });

  describe('normalizeKeyword', () => {
    it('collapses whitespace and trims', () => {
      expect(normalizeKeyword('  leg \n cramps ')).toBe('leg cramps');
    });

    it('treats blank keywords as absent', () => {
      expect(normalizeKeyword('   ')).toBeUndefined();
      expect(normalizeKeyword(undefined)).toBeUndefined();
    });

    it('caps the keyword at 100 characters', () => {
      expect(normalizeKeyword('k'.repeat(250))).toBe('k'.repeat(100));
    });
  });
});
