import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { ChatwootClient } from '../../adapters/chatwoot/client';
import { ChatwootNotificationDispatcher, LogNotificationDispatcher } from './dispatcher';

const settings = {
  url: 'https://chat.example.test/',
  apiKey: 'test-api-key',
  accountId: 7,
  staffConversationId: 42,
};

function capturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'info', base: null },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { logger, lines };
}

describe('ChatwootNotificationDispatcher', () => {
  it('posts the alert as a private note on the staff conversation', async () => {
    const fetchMock = vi.fn(async () => new Response('{}', { status: 200 }));
    const dispatcher = new ChatwootNotificationDispatcher(new ChatwootClient(settings, fetchMock), 42);

    dispatcher.send('High pain alert', 'Someone reported pain 9/10.');

    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    expect(fetchMock).toHaveBeenCalledWith(
      'https://chat.example.test/api/v1/accounts/7/conversations/42/messages',
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'api_access_token': 'test-api-key',
        },
        body: JSON.stringify({
          content: '**High pain alert**\nSomeone reported pain 9/10.',
          message_type: 'outgoing',
          private: true,
        }),
      }
    );
  });

  it('logs delivery failures instead of throwing', async () => {
    const { logger, lines } = capturingLogger();
    const fetchMock = vi.fn(async () => new Response('nope', { status: 500 }));
    const dispatcher = new ChatwootNotificationDispatcher(
      new ChatwootClient(settings, fetchMock),
      42,
      logger
    );

    expect(() => dispatcher.send('Low mood alert', 'body')).not.toThrow();

    await vi.waitFor(() => expect(lines).toHaveLength(1));
    expect(lines[0]).toMatchObject({
      msg: 'Failed to deliver staff alert',
      err: 'Chatwoot error: Failed to send message: 500 nope',
      title: 'Low mood alert',
    });
  });
});

describe('LogNotificationDispatcher', () => {
  it('logs the title without the body', () => {
    const { logger, lines } = capturingLogger();

    new LogNotificationDispatcher(logger).send('High pain alert', 'Named Person reported pain 9/10.');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ msg: 'Staff alert', title: 'High pain alert', bodyLength: 32 });
    expect(lines[0]).not.toHaveProperty('body');
  });
});
