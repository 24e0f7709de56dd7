import type { Logger } from 'pino';
import { logger as rootLogger } from '../../infra/logging/logger';
import {
  HistoryUnavailableError,
  SubjectNotFoundError,
  asError,
} from '../../shared/errors';
import type {
  CheckInInput,
  CheckInRecord,
  EscalationJobData,
  HistoryFilter,
} from '../../shared/types';
import { sanitizeCheckIn } from '../../shared/validation';
import type { SubjectDirectory } from '../subject/service';
import { type LatestSummary, latestSummary } from './history';
import type { CheckinStore } from './repository';

export type EnqueueEscalation = (data: EscalationJobData) => Promise<unknown>;

export class CheckinService {
  private logger: Logger;

  constructor(
    private store: CheckinStore,
    private subjects: SubjectDirectory,
    private enqueueEscalation: EnqueueEscalation,
    logger?: Logger
  ) {
    this.logger = logger ?? rootLogger;
  }

  /**
   * Persist a check-in and schedule its escalation evaluation.
   * Scheduling failures are logged; the stored check-in is still returned.
   */
  async submitCheckin(
    subjectId: string,
    input: CheckInInput,
    at: Date = new Date()
  ): Promise<CheckInRecord> {
    await this.requireSubject(subjectId);

    const record = await this.store.createRecord(subjectId, sanitizeCheckIn(input), at);

    try {
      await this.enqueueEscalation({
        subjectId,
        checkInId: record.id,
        submittedAt: at.toISOString(),
      });
    } catch (error) {
      this.logger.error(
        { subjectId, checkInId: record.id, error: asError(error).message },
        'Failed to enqueue escalation job'
      );
    }

    this.logger.info({ subjectId, checkInId: record.id }, 'Check-in stored');
    return record;
  }

  async listHistory(subjectId: string, filter: HistoryFilter = {}): Promise<CheckInRecord[]> {
    await this.requireSubject(subjectId);
    return this.readHistory(subjectId, filter);
  }

  async getLatestSummary(subjectId: string): Promise<LatestSummary | null> {
    await this.requireSubject(subjectId);
    return latestSummary(await this.readHistory(subjectId, { limit: 1 }));
  }

  private async requireSubject(subjectId: string): Promise<void> {
    const subject = await this.subjects.findById(subjectId);
    if (!subject) {
      throw new SubjectNotFoundError(subjectId);
    }
  }

  private async readHistory(subjectId: string, filter: HistoryFilter): Promise<CheckInRecord[]> {
    try {
      return await this.store.fetchHistory(subjectId, filter);
    } catch (error) {
      const err = asError(error);
      this.logger.warn({ subjectId, error: err.message }, 'History fetch failed');
      throw new HistoryUnavailableError(subjectId, err);
    }
  }
}
