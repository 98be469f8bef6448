import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Markup, Telegraf, session } from 'telegraf';
import { message } from 'telegraf/filters';
import { SETTINGS, Settings } from '../config/settings';
import { BuildReply, BuildService } from '../build/build.service';
import {
  CANCEL_ACTION,
  CONFIRM_ACTION,
  HELP_MESSAGE,
  NO_BUILD_IN_PROGRESS_MESSAGE,
  NOTHING_TO_CANCEL_MESSAGE,
  WELCOME_MESSAGE,
} from '../build/build.messages';
import { BotSession, MyContext } from './types';
import { errorMiddleware } from './bot.middleware';

// src/bot/bot.service.ts

const confirmationKeyboard = Markup.inlineKeyboard([
  [Markup.button.callback('✅ Confirm & Start Build', CONFIRM_ACTION)],
  [Markup.button.callback('❌ Cancel', CANCEL_ACTION)],
]);

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
  private bot: Telegraf<MyContext>;
  private logger = new Logger(BotService.name);

  constructor(
    @Inject(SETTINGS) settings: Settings,
    private builds: BuildService,
  ) {
    this.bot = new Telegraf<MyContext>(settings.telegramToken);
  }

  onModuleInit() {
    this.bot.use(session({ defaultSession: (): BotSession => ({}) }));
    this.bot.use(errorMiddleware);

    this.registerCommands();
    this.registerActions();
    this.registerHandlers();

    // launch() resolves only once polling stops
    this.bot
      .launch(() => this.logger.log('✅ Telegram bot started'))
      .catch((error: unknown) => {
        this.logger.error('❌ Telegram bot stopped with an error:', error);
        process.exitCode = 1;
      });
  }

  onModuleDestroy() {
    this.bot.stop('SIGTERM');
  }

  // ==================== COMMANDS ====================

  private registerCommands() {
    this.bot.command('start', async (ctx) => {
      await ctx.reply(WELCOME_MESSAGE, { parse_mode: 'Markdown' });
    });

    this.bot.command('help', async (ctx) => {
      await ctx.reply(HELP_MESSAGE, { parse_mode: 'Markdown' });
    });

    this.bot.command('build', async (ctx) => {
      const { session, reply } = this.builds.start(ctx.from.id);
      ctx.session.build = session;
      await this.send(ctx, reply);
    });

    this.bot.command('cancel', async (ctx) => {
      const { session, reply } = this.builds.cancel(ctx.session.build);
      ctx.session.build = session;
      await this.send(ctx, reply);
    });

    this.bot.command('status', async (ctx) => {
      const text = await this.builds.status(ctx.from.id);
      await ctx.reply(text, { parse_mode: 'Markdown' });
    });
  }

  // ==================== CONFIRMATION BUTTONS ====================

  private registerActions() {
    this.bot.action(CONFIRM_ACTION, async (ctx) => {
      if (!ctx.session.build) {
        // Stale button: the build was already confirmed or cancelled
        await ctx.answerCbQuery(NO_BUILD_IN_PROGRESS_MESSAGE);
        return;
      }

      const { session, reply } = await this.builds.confirm(ctx.session.build);

      if (session) {
        // Still waiting: a dispatch is pending or the summary is not reached
        await ctx.answerCbQuery(reply.text);
        return;
      }

      ctx.session.build = undefined;
      await ctx.answerCbQuery();
      await ctx.editMessageText(reply.text, { parse_mode: 'Markdown' });
    });

    this.bot.action(CANCEL_ACTION, async (ctx) => {
      if (!ctx.session.build) {
        await ctx.answerCbQuery(NOTHING_TO_CANCEL_MESSAGE);
        return;
      }

      const { session, reply } = this.builds.cancel(ctx.session.build);

      if (session) {
        await ctx.answerCbQuery(reply.text);
        return;
      }

      ctx.session.build = undefined;
      await ctx.answerCbQuery();
      await ctx.editMessageText(reply.text);
    });
  }

  // ==================== MESSAGE HANDLERS ====================

  private registerHandlers() {
    this.bot.on(message('text'), async (ctx) => {
      const text = ctx.message.text;

      if (text.startsWith('/')) {
        await ctx.reply('Unknown command. Use /help to see what I can do.');
        return;
      }

      const { session, reply } = this.builds.reply(ctx.session.build, text);
      ctx.session.build = session;
      await this.send(ctx, reply);
    });
  }

  private async send(ctx: MyContext, reply: BuildReply) {
    await ctx.reply(reply.text, {
      parse_mode: 'Markdown',
      ...(reply.withConfirmation ? confirmationKeyboard : {}),
    });
  }
}
