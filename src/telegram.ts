import { Context, Markup, Telegraf } from 'telegraf';
import type { Logger } from 'pino';
import type { AppConfig } from './config';
import { CommandDispatcher, MENU_ACTIONS, type MenuAction } from './dispatcher';
import { toError } from './errors';
import type { InboundMessage, Reply } from './types';

const MENU_ACTION_RE = new RegExp(`^menu_(${MENU_ACTIONS.join('|')})$`);

function isMenuAction(value: string): value is MenuAction {
  return MENU_ACTIONS.some((action) => action === value);
}

export function getMainKeyboard() {
  return Markup.inlineKeyboard([
    [
      Markup.button.callback('📥 Lưu UID / Save UID', 'menu_save'),
      Markup.button.callback('📤 Xuất CSV / Export CSV', 'menu_export'),
    ],
    [
      Markup.button.callback('🔎 Tìm UID / Find UID', 'menu_find'),
      Markup.button.callback('🗑️ Xoá UID / Delete UID', 'menu_delete'),
    ],
    [
      Markup.button.callback('📊 Thống kê / Stats', 'menu_stats'),
      Markup.button.callback('⚙️ Cài đặt / Settings', 'menu_settings'),
    ],
    [Markup.button.callback('ℹ️ Help', 'menu_help')],
  ]);
}

export type ReplyContext = Pick<Context, 'reply' | 'replyWithDocument' | 'replyWithPhoto'>;

/**
 * Отправляет Reply в чат. Меню прикрепляется только к тексту с menu = true
 */
export async function renderReply(ctx: ReplyContext, reply: Reply): Promise<void> {
  switch (reply.kind) {
    case 'none':
      return;
    case 'text':
      await ctx.reply(reply.text, reply.menu ? getMainKeyboard() : undefined);
      return;
    case 'document':
      await ctx.replyWithDocument(
        { source: reply.content, filename: reply.filename },
        reply.caption ? { caption: reply.caption } : undefined
      );
      return;
    case 'photo':
      await ctx.replyWithPhoto(reply.url, reply.caption ? { caption: reply.caption } : undefined);
      return;
  }
}

/**
 * Транспорт Telegram: превращает апдейты telegraf в InboundMessage,
 * отдаёт их диспетчеру и отправляет Reply обратно в чат
 */
export class TelegramBot {
  private bot: Telegraf;
  private readonly logger: Logger;

  constructor(
    config: AppConfig,
    private readonly dispatcher: CommandDispatcher,
    logger: Logger
  ) {
    this.logger = logger.child({ module: 'telegram' });
    this.bot = new Telegraf(config.TELEGRAM_BOT_TOKEN);
    this.setupHandlers();
  }

  private setupHandlers() {
    // Команды тоже приходят как текст, разбор в диспетчере
    this.bot.on('text', async (ctx) => {
      const message: InboundMessage = {
        chatId: ctx.message.chat.id,
        userId: ctx.message.from.id,
        text: ctx.message.text,
      };
      const reply = await this.dispatcher.dispatch(message);
      await this.sendReply(ctx, reply);
    });

    this.bot.action(MENU_ACTION_RE, async (ctx) => {
      try {
        await ctx.answerCbQuery();
      } catch (cbError) {
        this.logger.debug({ error: toError(cbError).message }, 'Callback query already answered or expired, continuing...');
      }

      const action = ctx.match[1];
      const chatId = ctx.chat?.id;
      const userId = ctx.from?.id;
      if (!isMenuAction(action) || chatId === undefined || userId === undefined) return;

      const reply = await this.dispatcher.handleMenuAction(action, {
        chatId,
        userId,
        text: `menu_${action}`,
      });
      await this.sendReply(ctx, reply);
    });

    // Обработка ошибок
    this.bot.catch((err, ctx) => {
      this.logger.error({ error: toError(err).message, updateType: ctx.updateType }, 'Telegram bot error');
    });
  }

  private async sendReply(ctx: Context, reply: Reply): Promise<void> {
    try {
      await renderReply(ctx, reply);
    } catch (error) {
      this.logger.error({ error: toError(error).message, kind: reply.kind }, '❌ Failed to send reply');
    }
  }

  public async start(): Promise<void> {
    this.logger.info('🚀 Launching Telegram bot...');
    // Промис завершается только после остановки polling
    await this.bot.launch(() => {
      this.logger.info('🤖 Telegram bot started successfully');
    });
  }

  public stop(reason: string): void {
    this.bot.stop(reason);
    this.logger.info({ reason }, '🤖 Telegram bot stopped');
  }
}
