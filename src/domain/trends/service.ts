import type { Logger } from 'pino';
import { logger as rootLogger } from '../../infra/logging/logger';
import { asError, HistoryUnavailableError } from '../../shared/errors';
import { type Daypart, daypartOf, startOfDay, subtractDays } from '../../shared/calendar';
import type { CheckInRecord, EnergyBucket, MoodBucket } from '../../shared/types';
import type { TextCategorizer } from '../categorizer/service';
import { sortChronologically } from '../checkin/history';
import type { HistorySource } from '../checkin/repository';

// ============================================================================
// Types
// ============================================================================

export interface TrendPoint {
  timestamp: Date;
  value: number;
}

export interface CategoryCount {
  category: string;
  count: number;
}

export interface TrendResult {
  subjectId: string;
  /** Oldest first */
  painSeries: TrendPoint[];
  energyDistribution: Partial<Record<EnergyBucket, number>>;
  moodDistribution: Partial<Record<MoodBucket, number>>;
  /** Every symptom category seen, count desc, ties in first-seen order */
  symptomCategoryTotals: CategoryCount[];
  /** Per-day counts (oldest day first), top categories only */
  symptomCategoryDaily: Record<string, TrendPoint[]>;
  concernCategoryTotals: CategoryCount[];
  daypartCounts: Partial<Record<Daypart, number>>;
  highPainRate: number;
  lowEnergyRate: number;
  totalRecordsInWindow: number;
  windowStart: Date;
  windowEnd: Date;
  timeZone: string;
}

export interface TrendRequestOptions {
  now?: Date;
  timeZone?: string;
}

export interface TrendServiceOptions {
  highPainThreshold: number;
  defaultTimeZone: string;
  logger?: Logger;
}

export const DEFAULT_WINDOW_DAYS = 30;
export const DEFAULT_MAX_RECORDS = 250;
export const TOP_SYMPTOM_CATEGORIES = 5;

// ============================================================================
// Service
// ============================================================================

export class TrendService {
  private log: Logger;

  constructor(
    private history: HistorySource,
    private categorizer: TextCategorizer,
    private options: TrendServiceOptions
  ) {
    this.log = options.logger ?? rootLogger.child({ component: 'trends' });
  }

  /**
   * Trend datasets for one subject over the last `windowDays` (at least 1).
   * Throws HistoryUnavailableError if the history query fails; no partial
   * result is produced in that case.
   */
  async computeTrends(
    subjectId: string,
    windowDays: number = DEFAULT_WINDOW_DAYS,
    maxRecords: number = DEFAULT_MAX_RECORDS,
    requestOptions: TrendRequestOptions = {}
  ): Promise<TrendResult> {
    const windowEnd = requestOptions.now ?? new Date();
    const windowStart = subtractDays(windowEnd, Math.max(1, windowDays));
    const timeZone = requestOptions.timeZone ?? this.options.defaultTimeZone;

    let records: CheckInRecord[];
    try {
      records = await this.history.fetchHistory(subjectId, {
        startDate: windowStart,
        endDate: windowEnd,
        limit: maxRecords,
      });
    } catch (error) {
      const err = asError(error);
      this.log.warn({ subjectId, error: err.message }, 'Trend history fetch failed');
      throw new HistoryUnavailableError(subjectId, err);
    }

    const chronological = sortChronologically(records);

    const painSeries: TrendPoint[] = [];
    const energyDistribution: Partial<Record<EnergyBucket, number>> = {};
    const moodDistribution: Partial<Record<MoodBucket, number>> = {};
    const daypartCounts: Partial<Record<Daypart, number>> = {};
    const symptomTotals = new Map<string, number>();
    const symptomByDay = new Map<string, Map<number, number>>();
    const concernTotals = new Map<string, number>();
    let highPainCount = 0;
    let lowEnergyCount = 0;

    for (const record of chronological) {
      if (record.createdAt) {
        painSeries.push({ timestamp: record.createdAt, value: record.painLevel });
        increment(daypartCounts, daypartOf(record.createdAt, timeZone));
      }

      if (record.painLevel >= this.options.highPainThreshold) highPainCount++;
      if (record.energyBucket === 'low') lowEnergyCount++;

      if (record.energyBucket) increment(energyDistribution, record.energyBucket);
      if (record.moodBucket) increment(moodDistribution, record.moodBucket);

      for (const category of this.categorizer.categorizeConcerns(record.concernsText)) {
        concernTotals.set(category, (concernTotals.get(category) ?? 0) + 1);
      }

      const categories = this.categorizer.categorizeSymptoms(record.symptomsText);
      if (categories.length === 0) continue;

      // Undated legacy rows land on the window's last day
      const day = startOfDay(record.createdAt ?? windowEnd, timeZone).getTime();
      for (const category of categories) {
        symptomTotals.set(category, (symptomTotals.get(category) ?? 0) + 1);
        const perDay = symptomByDay.get(category) ?? new Map<number, number>();
        perDay.set(day, (perDay.get(day) ?? 0) + 1);
        symptomByDay.set(category, perDay);
      }
    }

    const symptomCategoryTotals = rankCategories(symptomTotals);
    const symptomCategoryDaily: Record<string, TrendPoint[]> = {};
    for (const { category } of symptomCategoryTotals.slice(0, TOP_SYMPTOM_CATEGORIES)) {
      const perDay = symptomByDay.get(category) ?? new Map<number, number>();
      symptomCategoryDaily[category] = [...perDay.entries()]
        .sort(([a], [b]) => a - b)
        .map(([day, count]) => ({ timestamp: new Date(day), value: count }));
    }

    const total = records.length;

    this.log.debug({ subjectId, windowDays, total }, 'Trends computed');

    return {
      subjectId,
      painSeries,
      energyDistribution,
      moodDistribution,
      symptomCategoryTotals,
      symptomCategoryDaily,
      concernCategoryTotals: rankCategories(concernTotals),
      daypartCounts,
      highPainRate: total === 0 ? 0 : highPainCount / total,
      lowEnergyRate: total === 0 ? 0 : lowEnergyCount / total,
      totalRecordsInWindow: total,
      windowStart,
      windowEnd,
      timeZone,
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function rankCategories(totals: Map<string, number>): CategoryCount[] {
  // Map iteration is insertion order, and sort is stable: ties stay first-seen
  return [...totals.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count);
}

function increment<K extends string>(histogram: Partial<Record<K, number>>, key: K): void {
  histogram[key] = (histogram[key] ?? 0) + 1;
}
