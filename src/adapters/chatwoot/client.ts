import type { Config } from '../../config';
import { ChatwootError, asError } from '../../shared/errors';
import { logger } from '../../infra/logging/logger';

export type ChatwootSettings = NonNullable<Config['chatwoot']>;

interface SendMessageOptions {
  isPrivate?: boolean;
}

type FetchFn = typeof fetch;

export class ChatwootClient {
  private baseUrl: string;
  private apiKey: string;
  private accountId: number;

  constructor(settings: ChatwootSettings, private fetchFn: FetchFn = fetch) {
    this.baseUrl = settings.url.replace(/\/+$/, '');
    this.apiKey = settings.apiKey;
    this.accountId = settings.accountId;
  }

  /**
   * Post a message to a conversation. Private messages show up as internal
   * notes visible to agents only.
   */
  async sendMessage(
    conversationId: number,
    content: string,
    options: SendMessageOptions = {}
  ): Promise<void> {
    const url = `${this.baseUrl}/api/v1/accounts/${this.accountId}/conversations/${conversationId}/messages`;

    const body = {
      content,
      message_type: 'outgoing',
      private: options.isPrivate ?? false,
    };

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'api_access_token': this.apiKey,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      const err = asError(error);
      throw new ChatwootError(`Network error: ${err.message}`, err);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new ChatwootError(`Failed to send message: ${response.status} ${detail}`);
    }

    logger.debug({ conversationId, contentLength: content.length }, 'Message sent via Chatwoot');
  }
}
