// src/bot/bot.middleware.ts
import { Logger } from '@nestjs/common';
import { MyContext } from './types';

const logger = new Logger('BotMiddleware');

export const FAILURE_MESSAGE =
  '⚠️ Something went wrong while handling your request. Please try again later.';

export const errorMiddleware = async (
  ctx: MyContext,
  next: () => Promise<void>,
) => {
  try {
    await next();
  } catch (error) {
    logger.error(
      `Failed to handle ${ctx.updateType} from ${ctx.from?.id} in chat ${ctx.chat?.id}:`,
      error,
    );

    // Button taps stay "loading" until the query is answered
    if (ctx.callbackQuery) {
      await ctx.answerCbQuery(FAILURE_MESSAGE).catch((answerError: unknown) => {
        logger.warn('Could not answer the callback query:', answerError);
      });
    }

    if (ctx.chat) {
      await ctx.reply(FAILURE_MESSAGE);
    }
  }
};
