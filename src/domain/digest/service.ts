import type { Logger } from 'pino';
import { logger as rootLogger } from '../../infra/logging/logger';
import { calendarDaysBetween } from '../../shared/calendar';
import { asError } from '../../shared/errors';
import type { CheckInRecord } from '../../shared/types';
import type { HistorySource } from '../checkin/repository';
import type { EscalationDetector } from '../escalation/detector';
import { digestDetail } from '../escalation/messages';
import type { SubjectDirectory } from '../subject/service';

export interface DigestEntry {
  subjectId: string;
  name: string;
  detail: string;
}

export interface Digest {
  atRisk: DigestEntry[];
  overdue: DigestEntry[];
  generatedAt: Date;
}

export interface DigestOptions {
  overdueDays: number;
  maxPerSection: number;
  now: Date;
  includeAtRisk?: boolean;
  includeOverdue?: boolean;
  timeZone?: string;
}

export interface DigestServiceOptions {
  maxHistorySamples: number;
  defaultTimeZone: string;
  logger?: Logger;
}

export const DEFAULT_OVERDUE_DAYS = 3;
export const DEFAULT_MAX_PER_SECTION = 10;

const UNNAMED_SUBJECT = 'This client';

/**
 * Staff overview across every subject. At-risk uses the escalation detector
 * with the newest record as the latest check-in, so both paths share one set
 * of thresholds.
 */
export class DigestService {
  private log: Logger;

  constructor(
    private subjects: SubjectDirectory,
    private history: HistorySource,
    private detector: EscalationDetector,
    private options: DigestServiceOptions
  ) {
    this.log = options.logger ?? rootLogger.child({ component: 'digest' });
  }

  async buildDigest(options: DigestOptions): Promise<Digest> {
    const { now, overdueDays } = options;
    const includeAtRisk = options.includeAtRisk ?? true;
    const includeOverdue = options.includeOverdue ?? true;
    const timeZone = options.timeZone ?? this.options.defaultTimeZone;
    const limit = Math.max(0, Math.floor(options.maxPerSection));

    const atRisk: DigestEntry[] = [];
    const overdue: DigestEntry[] = [];

    for (const subject of await this.subjects.listSubjects()) {
      let history: CheckInRecord[];
      try {
        history = await this.history.fetchHistory(subject.id, {
          limit: this.options.maxHistorySamples,
        });
      } catch (error) {
        this.log.warn({ subjectId: subject.id, error: asError(error).message }, 'Digest skipped subject');
        continue;
      }

      const name = subject.displayName ?? UNNAMED_SUBJECT;

      if (includeAtRisk) {
        const detail = this.atRiskDetail(history, now);
        if (detail) atRisk.push({ subjectId: subject.id, name, detail });
      }

      if (includeOverdue) {
        const detail = overdueDetail(history, now, overdueDays, timeZone);
        if (detail) overdue.push({ subjectId: subject.id, name, detail });
      }
    }

    return {
      atRisk: atRisk.slice(0, limit),
      overdue: overdue.slice(0, limit),
      generatedAt: now,
    };
  }

  private atRiskDetail(newestFirst: readonly CheckInRecord[], now: Date): string | null {
    const latest = newestFirst[0];
    if (!latest) {
      return null;
    }
    const detection = this.detector.evaluate(latest, newestFirst, now);
    return detection ? digestDetail(detection) : null;
  }
}

export function overdueDetail(
  newestFirst: readonly CheckInRecord[],
  now: Date,
  overdueDays: number,
  timeZone: string
): string | null {
  const last = newestFirst[0]?.createdAt;
  if (!last) {
    return 'No check-ins yet';
  }

  const days = calendarDaysBetween(last, now, timeZone);
  return days >= overdueDays ? `Last check-in ${days}d ago` : null;
}
