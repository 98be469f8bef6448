import { Logger } from '@nestjs/common';
import { Telegraf, Telegram } from 'telegraf';
import { message } from 'telegraf/filters';
import { FAILURE_MESSAGE, errorMiddleware } from './bot.middleware';
import { MyContext } from './types';

const CHAT = { id: 7, type: 'private', first_name: 'Test' } as const;
const FROM = { id: 7, is_bot: false, first_name: 'Test' };

const stubTelegramApi = () =>
  jest.spyOn(Telegram.prototype, 'callApi').mockResolvedValue(true);

describe('errorMiddleware', () => {
  let bot: Telegraf<MyContext>;
  let callApi: ReturnType<typeof stubTelegramApi>;
  let logError: jest.SpyInstance;

  beforeEach(() => {
    callApi = stubTelegramApi();
    logError = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();

    bot = new Telegraf<MyContext>('test-telegram-token');
    bot.use(errorMiddleware);
    bot.action('boom', () => {
      throw new Error('boom');
    });
    bot.on(message('text'), () => {
      throw new Error('boom');
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const payloads = (method: string) =>
    callApi.mock.calls
      .filter(([name]) => name === method)
      .map(([, payload]) => payload);

  const pressBoom = () =>
    bot.handleUpdate({
      update_id: 2,
      callback_query: {
        id: 'query-2',
        from: FROM,
        chat_instance: 'test-chat-instance',
        data: 'boom',
        message: { message_id: 100, date: 0, chat: CHAT, text: 'summary' },
      },
    });

  it('replies in the chat when a text handler throws', async () => {
    await bot.handleUpdate({
      update_id: 1,
      message: { message_id: 1, date: 0, chat: CHAT, from: FROM, text: 'hi' },
    });

    expect(logError).toHaveBeenCalledTimes(1);
    expect(payloads('sendMessage')).toEqual([
      expect.objectContaining({ chat_id: 7, text: FAILURE_MESSAGE }),
    ]);
    expect(payloads('answerCallbackQuery')).toEqual([]);
  });

  it('answers the callback query when a button handler throws', async () => {
    await pressBoom();

    expect(payloads('answerCallbackQuery')).toEqual([
      expect.objectContaining({
        callback_query_id: 'query-2',
        text: FAILURE_MESSAGE,
      }),
    ]);
    expect(payloads('sendMessage')).toEqual([
      expect.objectContaining({ chat_id: 7, text: FAILURE_MESSAGE }),
    ]);
  });

  it('still replies when the callback query cannot be answered', async () => {
    callApi.mockImplementation(async (method) => {
      if (method === 'answerCallbackQuery') {
        throw new Error('query is too old');
      }
      return true;
    });

    await pressBoom();

    expect(payloads('sendMessage')).toEqual([
      expect.objectContaining({ text: FAILURE_MESSAGE }),
    ]);
  });
});
