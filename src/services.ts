import type { Pool } from 'pg';
import type { Logger } from 'pino';
import { ChatwootClient } from './adapters/chatwoot/client';
import type { Config } from './config';
import { KeywordTextCategorizer } from './domain/categorizer/service';
import { PostgresCheckinRepository } from './domain/checkin/repository';
import { type EnqueueEscalation, CheckinService } from './domain/checkin/service';
import { DigestService } from './domain/digest/service';
import { EscalationDetector } from './domain/escalation/detector';
import { EscalationService } from './domain/escalation/service';
import { NotificationThrottle, PostgresCooldownStore } from './domain/escalation/throttle';
import {
  ChatwootNotificationDispatcher,
  LogNotificationDispatcher,
  type NotificationDispatcher,
} from './domain/notification/dispatcher';
import { SubjectService } from './domain/subject/service';
import { TrendService } from './domain/trends/service';

export function createDispatcher(appConfig: Config, logger: Logger): NotificationDispatcher {
  if (!appConfig.chatwoot) {
    logger.warn('Chatwoot not configured, staff alerts go to the log');
    return new LogNotificationDispatcher(logger);
  }
  return new ChatwootNotificationDispatcher(
    new ChatwootClient(appConfig.chatwoot),
    appConfig.chatwoot.staffConversationId,
    logger
  );
}

/** Services behind the HTTP API */
export function createApiServices(db: Pool, appConfig: Config, enqueue: EnqueueEscalation) {
  const checkinRepository = new PostgresCheckinRepository(db);
  const subjects = new SubjectService(db);
  const detector = new EscalationDetector(appConfig.escalation);

  return {
    subjects,
    checkins: new CheckinService(checkinRepository, subjects, enqueue),
    trends: new TrendService(checkinRepository, new KeywordTextCategorizer(), {
      highPainThreshold: appConfig.escalation.highPainThreshold,
      defaultTimeZone: appConfig.defaultTimeZone,
    }),
    digest: new DigestService(subjects, checkinRepository, detector, {
      maxHistorySamples: appConfig.escalation.maxHistorySamples,
      defaultTimeZone: appConfig.defaultTimeZone,
    }),
  };
}

/** Escalation workflow run by the worker */
export function createEscalationService(db: Pool, appConfig: Config, logger: Logger): EscalationService {
  return new EscalationService({
    subjects: new SubjectService(db),
    checkins: new PostgresCheckinRepository(db),
    detector: new EscalationDetector(appConfig.escalation),
    throttle: new NotificationThrottle(
      new PostgresCooldownStore(db),
      appConfig.escalation.notificationCooldownHours
    ),
    dispatcher: createDispatcher(appConfig, logger),
    config: appConfig.escalation,
    logger,
  });
}
