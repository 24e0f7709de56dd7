import { describe, expect, it } from 'vitest';
import { DEFAULT_ESCALATION_CONFIG, type CheckInRecord } from '../../shared/types';
import { EscalationDetector } from './detector';

const NOW = new Date('2024-06-30T12:00:00Z');
const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

let seq = 0;
function checkIn(ageMs: number, extra: Partial<CheckInRecord> = {}): CheckInRecord {
  seq += 1;
  return {
    id: `c${seq}`,
    subjectId: 'subject-1',
    createdAt: new Date(NOW.getTime() - ageMs),
    painLevel: 1,
    ...extra,
  };
}

describe('EscalationDetector', () => {
  const detector = new EscalationDetector();

  describe('single-reading rules', () => {
    it('flags high pain at the threshold', () => {
      const latest = checkIn(0, { painLevel: 8 });
      expect(detector.detect(latest, [], NOW)).toBe('highPain');
    });

    it('does not flag pain just below the threshold', () => {
      expect(detector.detect(checkIn(0, { painLevel: 7 }), [], NOW)).toBeNull();
    });

    it('reports high pain ahead of low mood', () => {
      const latest = checkIn(0, { painLevel: 9, moodBucket: 'sad' });
      expect(detector.evaluate(latest, [], NOW)).toEqual({ kind: 'highPain', painLevel: 9 });
    });

    it('flags a mood at or below the threshold', () => {
      expect(detector.evaluate(checkIn(0, { moodBucket: 'sad' }), [], NOW)).toEqual({
        kind: 'lowMood',
        mood: 'sad',
      });
      expect(detector.detect(checkIn(0, { moodBucket: 'neutral' }), [], NOW)).toBeNull();

      const stricter = new EscalationDetector({
        ...DEFAULT_ESCALATION_CONFIG,
        moodEscalationThreshold: 'neutral',
      });
      expect(stricter.detect(checkIn(0, { moodBucket: 'neutral' }), [], NOW)).toBe('lowMood');
    });
  });

  describe('rapid pain increase', () => {
    const first = checkIn(2 * DAY, { painLevel: 2 });
    const middle = checkIn(1 * DAY, { painLevel: 4 });
    const latest = checkIn(1 * HOUR, { painLevel: 7 });

    it('flags a climb of at least 3 ending at or above 6', () => {
      expect(detector.evaluate(latest, [middle, first], NOW)).toEqual({
        kind: 'rapidPainIncrease',
        fromPain: 2,
        toPain: 7,
      });
    });

    it('evaluates the same whether or not history already holds the latest record', () => {
      expect(detector.detect(latest, [latest, middle, first], NOW)).toBe('rapidPainIncrease');
      expect(detector.detect(latest, [middle, first], NOW)).toBe('rapidPainIncrease');
    });

    it('needs the minimum number of samples', () => {
      expect(detector.detect(latest, [first], NOW)).toBeNull();
    });

    it('ignores records older than the lookback', () => {
      const stale = checkIn(4 * DAY, { painLevel: 0 });
      const recent = checkIn(1 * DAY, { painLevel: 5 });
      const now = checkIn(1 * HOUR, { painLevel: 6 });
      expect(detector.detect(now, [recent, stale], NOW)).toBeNull();
    });

    it('requires the last reading to reach the floor', () => {
      const low = checkIn(2 * DAY, { painLevel: 1 });
      const mid = checkIn(1 * DAY, { painLevel: 2 });
      const end = checkIn(1 * HOUR, { painLevel: 5 });
      expect(detector.detect(end, [mid, low], NOW)).toBeNull();
    });

    it('skips undated records', () => {
      const undated: CheckInRecord = { ...checkIn(0, { painLevel: 0 }), createdAt: null };
      expect(detector.detect(latest, [middle, undated], NOW)).toBeNull();
    });
  });

  describe('rapid mood drop', () => {
    it('flags consecutive sad samples even when the latest record has no mood', () => {
      const history = [checkIn(1 * DAY, { moodBucket: 'sad' }), checkIn(2 * DAY, { moodBucket: 'sad' })];
      const latest = checkIn(1 * HOUR);

      expect(detector.evaluate(latest, history, NOW)).toEqual({
        kind: 'rapidMoodDrop',
        pattern: 'sadRun',
        previousMood: 'sad',
      });
    });

    it('flags a drop to sad from a better mood', () => {
      const history = [checkIn(12 * HOUR, { moodBucket: 'sad' }), checkIn(1 * DAY, { moodBucket: 'good' })];

      expect(detector.evaluate(checkIn(1 * HOUR), history, NOW)).toEqual({
        kind: 'rapidMoodDrop',
        pattern: 'dropFromBetter',
        previousMood: 'good',
      });
    });

    it('needs two mood samples inside the lookback', () => {
      const history = [checkIn(12 * HOUR, { moodBucket: 'sad' }), checkIn(6 * DAY, { moodBucket: 'good' })];
      expect(detector.detect(checkIn(1 * HOUR), history, NOW)).toBeNull();
    });

    it('does not flag when the latest mood sample improved', () => {
      const history = [checkIn(12 * HOUR, { moodBucket: 'neutral' }), checkIn(1 * DAY, { moodBucket: 'sad' })];
      expect(detector.detect(checkIn(1 * HOUR), history, NOW)).toBeNull();
    });
  });

  it('returns null when nothing matches', () => {
    const history = [checkIn(1 * DAY, { painLevel: 3, moodBucket: 'good' })];
    expect(detector.detect(checkIn(1 * HOUR, { painLevel: 3, moodBucket: 'good' }), history, NOW)).toBeNull();
  });
});
