import { describe, expect, it } from 'vitest';
import { HistoryUnavailableError } from '../../shared/errors';
import type { CheckInRecord } from '../../shared/types';
import { KeywordTextCategorizer, type TextCategorizer } from '../categorizer/service';
import { InMemoryCheckinRepository } from '../checkin/memory-repository';
import type { HistorySource } from '../checkin/repository';
import { TrendService } from './service';

const NOW = new Date('2024-06-30T12:00:00Z');
const SUBJECT = 'subject-1';

function checkIn(id: string, createdAt: string | null, extra: Partial<CheckInRecord> = {}): CheckInRecord {
  return {
    id,
    subjectId: SUBJECT,
    createdAt: createdAt ? new Date(createdAt) : null,
    painLevel: 0,
    ...extra,
  };
}

function service(history: HistorySource, categorizer: TextCategorizer = new KeywordTextCategorizer()) {
  return new TrendService(history, categorizer, { highPainThreshold: 8, defaultTimeZone: 'UTC' });
}

/** Splits comma-separated text into categories */
const listCategorizer: TextCategorizer = {
  categorizeSymptoms: (text) => (text ? text.split(',') : []),
  categorizeConcerns: () => [],
};

describe('TrendService', () => {
  it('returns an empty, valid result when the window has no records', async () => {
    const result = await service(new InMemoryCheckinRepository()).computeTrends(SUBJECT, 30, 250, {
      now: NOW,
    });

    expect(result.totalRecordsInWindow).toBe(0);
    expect(result.painSeries).toEqual([]);
    expect(result.energyDistribution).toEqual({});
    expect(result.moodDistribution).toEqual({});
    expect(result.symptomCategoryTotals).toEqual([]);
    expect(result.symptomCategoryDaily).toEqual({});
    expect(result.concernCategoryTotals).toEqual([]);
    expect(result.daypartCounts).toEqual({});
    expect(result.highPainRate).toBe(0);
    expect(result.lowEnergyRate).toBe(0);
  });

  describe('with a populated window', () => {
    const repo = new InMemoryCheckinRepository([
      checkIn('old', '2024-05-01T09:00:00Z', { painLevel: 9 }),
      checkIn('r1', '2024-06-28T09:00:00Z', {
        painLevel: 3,
        energyBucket: 'low',
        moodBucket: 'neutral',
        symptomsText: 'headache',
        concernsText: 'insurance',
      }),
      checkIn('r2', '2024-06-28T18:00:00Z', {
        painLevel: 8,
        energyBucket: 'okay',
        moodBucket: 'sad',
        symptomsText: 'headache and cramps',
      }),
      checkIn('r3', '2024-06-29T13:00:00Z', { painLevel: 5, symptomsText: 'cramps' }),
      checkIn('r4', '2024-06-29T23:30:00Z', { painLevel: 2, energyBucket: 'low', symptomsText: 'itchy' }),
    ]);

    it('builds a chronological pain series from records inside the window', async () => {
      const result = await service(repo).computeTrends(SUBJECT, 30, 250, { now: NOW });

      expect(result.totalRecordsInWindow).toBe(4);
      expect(result.painSeries.map((p) => p.value)).toEqual([3, 8, 5, 2]);
      expect(result.painSeries[0]?.timestamp).toEqual(new Date('2024-06-28T09:00:00Z'));
      expect(result.windowStart).toEqual(new Date('2024-05-31T12:00:00Z'));
      expect(result.windowEnd).toEqual(NOW);
    });

    it('counts bucket histograms without zero-filling missing buckets', async () => {
      const result = await service(repo).computeTrends(SUBJECT, 30, 250, { now: NOW });

      expect(result.energyDistribution).toEqual({ low: 2, okay: 1 });
      expect(result.moodDistribution).toEqual({ neutral: 1, sad: 1 });
    });

    it('ranks symptom categories with ties in first-seen order', async () => {
      const result = await service(repo).computeTrends(SUBJECT, 30, 250, { now: NOW });

      expect(result.symptomCategoryTotals).toEqual([
        { category: 'headache', count: 2 },
        { category: 'cramps', count: 2 },
        { category: 'other', count: 1 },
      ]);
      expect(result.symptomCategoryDaily).toEqual({
        headache: [{ timestamp: new Date('2024-06-28T00:00:00Z'), value: 2 }],
        cramps: [
          { timestamp: new Date('2024-06-28T00:00:00Z'), value: 1 },
          { timestamp: new Date('2024-06-29T00:00:00Z'), value: 1 },
        ],
        other: [{ timestamp: new Date('2024-06-29T00:00:00Z'), value: 1 }],
      });
      expect(result.concernCategoryTotals).toEqual([{ category: 'financial_insurance', count: 1 }]);
    });

    it('reports dayparts and rates', async () => {
      const result = await service(repo).computeTrends(SUBJECT, 30, 250, { now: NOW });

      expect(result.daypartCounts).toEqual({ morning: 1, evening: 1, afternoon: 1, night: 1 });
      expect(result.highPainRate).toBe(0.25);
      expect(result.lowEnergyRate).toBe(0.5);
    });

    it('keeps only the newest maxRecords records', async () => {
      const result = await service(repo).computeTrends(SUBJECT, 30, 2, { now: NOW });

      expect(result.totalRecordsInWindow).toBe(2);
      expect(result.painSeries.map((p) => p.value)).toEqual([5, 2]);
    });
  });

  it('keeps daily series for the top five categories only', async () => {
    const repo = new InMemoryCheckinRepository([
      checkIn('1', '2024-06-25T10:00:00Z', { symptomsText: 'a,b,c' }),
      checkIn('2', '2024-06-26T10:00:00Z', { symptomsText: 'a,b,c' }),
      checkIn('3', '2024-06-27T10:00:00Z', { symptomsText: 'a,d' }),
      checkIn('4', '2024-06-28T10:00:00Z', { symptomsText: 'e,f' }),
    ]);

    const result = await service(repo, listCategorizer).computeTrends(SUBJECT, 30, 250, { now: NOW });

    expect(result.symptomCategoryTotals.map((c) => c.category)).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
    expect(Object.keys(result.symptomCategoryDaily)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('buckets days in the requested time zone', async () => {
    const repo = new InMemoryCheckinRepository([
      // 22:00 on Jun 28 in New York
      checkIn('1', '2024-06-29T02:00:00Z', { symptomsText: 'x' }),
    ]);

    const result = await service(repo, listCategorizer).computeTrends(SUBJECT, 30, 250, {
      now: NOW,
      timeZone: 'America/New_York',
    });

    expect(result.timeZone).toBe('America/New_York');
    expect(result.symptomCategoryDaily).toEqual({
      x: [{ timestamp: new Date('2024-06-28T04:00:00Z'), value: 1 }],
    });
    expect(result.daypartCounts).toEqual({ night: 1 });
  });

  it('uses at least a one-day window', async () => {
    const result = await service(new InMemoryCheckinRepository()).computeTrends(SUBJECT, 0, 250, {
      now: NOW,
    });

    expect(result.windowStart).toEqual(new Date('2024-06-29T12:00:00Z'));
  });

  it('fails with HistoryUnavailableError and no result when the fetch fails', async () => {
    const failing: HistorySource = {
      fetchHistory: async () => {
        throw new Error('connection reset');
      },
    };

    const attempt = service(failing).computeTrends(SUBJECT, 30, 250, { now: NOW });

    await expect(attempt).rejects.toBeInstanceOf(HistoryUnavailableError);
    await expect(attempt).rejects.toMatchObject({ code: 'HISTORY_UNAVAILABLE', statusCode: 503 });
  });
});
