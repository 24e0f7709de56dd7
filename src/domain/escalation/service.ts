import type { Logger } from 'pino';
import { logger as rootLogger } from '../../infra/logging/logger';
import {
  HistoryUnavailableError,
  SubjectNotFoundError,
  asError,
  isAppError,
} from '../../shared/errors';
import { KeyedLock } from '../../shared/keyed-lock';
import type { CheckInRecord, EscalationConfig, EscalationOutcome } from '../../shared/types';
import type { CheckinStore } from '../checkin/repository';
import type { NotificationDispatcher } from '../notification/dispatcher';
import type { SubjectDirectory } from '../subject/service';
import type { EscalationDetector } from './detector';
import { alertMessage } from './messages';
import type { NotificationThrottle } from './throttle';

export interface EscalationRequest {
  subjectId: string;
  checkInId: string;
  now: Date;
}

interface EscalationContext {
  latest: CheckInRecord;
  history: CheckInRecord[];
  displayName: string | null;
}

export interface EscalationDependencies {
  subjects: SubjectDirectory;
  checkins: Pick<CheckinStore, 'findById' | 'fetchHistory'>;
  detector: EscalationDetector;
  throttle: NotificationThrottle;
  dispatcher: NotificationDispatcher;
  config: Pick<EscalationConfig, 'maxHistorySamples'>;
  logger?: Logger;
}

/**
 * Runs once per submitted check-in: resolve the subject, read its recent
 * history, evaluate, and dispatch at most one alert per (subject, reason)
 * per cooldown window.
 *
 * Never throws. Anything that prevents evaluation is logged and reported as
 * `skipped`.
 */
export class EscalationService {
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;

  constructor(private deps: EscalationDependencies) {
    this.logger = deps.logger ?? rootLogger;
  }

  async handleCheckIn(request: EscalationRequest, parentLogger?: Logger): Promise<EscalationOutcome> {
    const { subjectId, checkInId, now } = request;
    const log = (parentLogger ?? this.logger).child({ subjectId, checkInId });

    let context: EscalationContext;
    try {
      context = await this.resolveContext(subjectId, checkInId);
    } catch (error) {
      const err = asError(error);
      log.warn({ err: err.message, code: isAppError(error) ? error.code : undefined }, 'Escalation skipped');
      return { status: 'skipped', error: err.message };
    }

    const { latest, history, displayName } = context;
    const detection = this.deps.detector.evaluate(latest, history, now);
    if (!detection) {
      log.debug('No escalation');
      return { status: 'none' };
    }

    const reason = detection.kind;
    const { throttle, dispatcher } = this.deps;

    try {
      return await this.lock.runExclusive(`${subjectId}|${reason}`, async () => {
        if (!(await throttle.shouldNotify(subjectId, reason, now))) {
          log.info({ reason }, 'Escalation suppressed by cooldown');
          return { status: 'suppressed', reason } as const;
        }

        const message = alertMessage(detection, displayName);
        dispatcher.send(message.title, message.body);
        await throttle.markNotified(subjectId, reason, now);

        log.info({ reason }, 'Escalation notified');
        return { status: 'notified', reason } as const;
      });
    } catch (error) {
      const err = asError(error);
      log.error({ err: err.message, reason }, 'Escalation throttle failed');
      return { status: 'skipped', error: err.message };
    }
  }

  private async resolveContext(subjectId: string, checkInId: string): Promise<EscalationContext> {
    const subject = await this.deps.subjects.findById(subjectId);
    if (!subject) {
      throw new SubjectNotFoundError(subjectId);
    }

    try {
      const [latest, history] = await Promise.all([
        this.deps.checkins.findById(checkInId),
        this.deps.checkins.fetchHistory(subjectId, { limit: this.deps.config.maxHistorySamples }),
      ]);

      if (!latest || latest.subjectId !== subjectId) {
        throw new Error(`Check-in ${checkInId} not found for subject`);
      }

      return { latest, history, displayName: subject.displayName };
    } catch (error) {
      if (error instanceof HistoryUnavailableError) {
        throw error;
      }
      throw new HistoryUnavailableError(subjectId, asError(error));
    }
  }
}
