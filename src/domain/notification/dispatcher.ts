import type { Logger } from 'pino';
import type { ChatwootClient } from '../../adapters/chatwoot/client';
import { logger as rootLogger } from '../../infra/logging/logger';
import { asError } from '../../shared/errors';

/**
 * Delivers a staff alert. Fire-and-forget: delivery failures are handled
 * (logged) inside the implementation and never reach the caller.
 */
export interface NotificationDispatcher {
  send(title: string, body: string): void;
}

/** Posts alerts as private notes on a staff-only Chatwoot conversation */
export class ChatwootNotificationDispatcher implements NotificationDispatcher {
  constructor(
    private client: ChatwootClient,
    private staffConversationId: number,
    private logger: Logger = rootLogger
  ) {}

  send(title: string, body: string): void {
    this.client
      .sendMessage(this.staffConversationId, `**${title}**\n${body}`, { isPrivate: true })
      .catch((error: unknown) => {
        const err = asError(error);
        this.logger.error({ err: err.message, title }, 'Failed to deliver staff alert');
      });
  }
}

/**
 * Used when no Chatwoot account is configured. Bodies carry the subject's
 * name, so only the title is written.
 */
export class LogNotificationDispatcher implements NotificationDispatcher {
  constructor(private logger: Logger = rootLogger) {}

  send(title: string, body: string): void {
    this.logger.warn({ title, bodyLength: body.length }, 'Staff alert');
  }
}
