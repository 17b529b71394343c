import { Bot, type Context } from 'grammy';
import type { AppConfig } from '../config/env.js';
import { handleLink } from '../handlers/link.js';
import { handleSelection } from '../handlers/selection.js';
import { handleHelp, handleStart } from '../handlers/start.js';
import type { MediaSource } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TelegramChat } from './chat.js';
import { isCommand } from './filters.js';

const logContextOf = (ctx: Context): Record<string, unknown> => ({
  chat: ctx.chat?.id,
  from: ctx.from?.username ? `@${ctx.from.username}` : ctx.from?.id,
  msgId: ctx.msg?.message_id,
});

/**
 * Wires updates to handlers: /start and /help, plain text (treated as a
 * link) and quality button presses. Other commands fall through unanswered.
 */
export function createBot(
  config: Pick<AppConfig, 'botToken' | 'maxFileSize'>,
  media: MediaSource
): Bot {
  const bot = new Bot(config.botToken);

  bot.command('start', (ctx) => handleStart(new TelegramChat(ctx)));
  bot.command('help', (ctx) => handleHelp(new TelegramChat(ctx)));

  bot.on('message:text', async (ctx) => {
    if (isCommand(ctx.message)) return;

    await handleLink(new TelegramChat(ctx), ctx.message.text.trim(), { media }, logContextOf(ctx));
  });

  bot.on('callback_query:data', async (ctx) => {
    await handleSelection(
      new TelegramChat(ctx),
      ctx.callbackQuery.data,
      { media, maxFileSize: config.maxFileSize },
      logContextOf(ctx)
    );
  });

  // Keeps polling alive when a handler throws past its own error handling
  bot.catch((err) => {
    logger.error('Unhandled error in bot', err.error, logContextOf(err.ctx));
  });

  return bot;
}
