import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import type { EscalationService } from '../domain/escalation/service';
import { logger as rootLogger } from '../infra/logging/logger';
import type { EscalationJobData, EscalationOutcome } from '../shared/types';

export type EscalationJob = Pick<Job<EscalationJobData>, 'id' | 'data'>;

/**
 * Job processor for the escalation queue. The workflow reports failures as
 * `skipped`, so a job only fails on a bug; nothing is retried.
 *
 * Rules are evaluated as of the check-in's submission time, so queue lag does
 * not shift the lookback windows or the cooldown timestamp.
 */
export function createEscalationProcessor(
  escalation: EscalationService,
  logger: Logger = rootLogger,
  clock: () => Date = () => new Date()
): (job: EscalationJob) => Promise<EscalationOutcome> {
  return async (job) => {
    const jobLogger = logger.child({
      jobId: job.id,
      subjectId: job.data.subjectId,
      checkInId: job.data.checkInId,
    });

    const evaluatedAt = evaluationInstant(job.data.submittedAt, clock);
    jobLogger.info({ evaluatedAt: evaluatedAt.toISOString() }, 'Processing escalation job');

    const outcome = await escalation.handleCheckIn(
      {
        subjectId: job.data.subjectId,
        checkInId: job.data.checkInId,
        now: evaluatedAt,
      },
      jobLogger
    );

    jobLogger.info({ status: outcome.status }, 'Escalation job finished');
    return outcome;
  };
}

function evaluationInstant(submittedAt: string, clock: () => Date): Date {
  const at = new Date(submittedAt);
  return Number.isNaN(at.getTime()) ? clock() : at;
}
