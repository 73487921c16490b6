import type { Logger } from 'pino';
import type { AppConfig } from './config';
import { UidStore } from './db';
import { ExternalLookupError, PermissionError, StorageError, ValidationError, toError } from './errors';
import { exportFilename, recordsToCsv } from './export';
import { findFacebookLinks, parseUidArgument, resolveLinkResult, type UidArgument } from './extractor';
import type { InboundMessage, ProfileLookup, Reply } from './types';

export const COMMAND_NAMES = [
  'start',
  'help',
  'getid',
  'save',
  'find',
  'check',
  'checkinfo',
  'photo',
  'settings',
  'delete',
  'deleteall',
  'export',
  'stats',
  'notify',
  'notifytext',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

// Старые вьетнамские имена команд
export const COMMAND_ALIASES: Readonly<Record<string, CommandName>> = {
  thongke: 'stats',
  layanh: 'photo',
  suathongbao: 'notifytext',
};

export const MENU_ACTIONS = ['save', 'export', 'find', 'delete', 'stats', 'settings', 'help'] as const;

export type MenuAction = (typeof MENU_ACTIONS)[number];

export const DEFAULT_NOTIFICATION_TEXT = 'Tự động lưu UID / Auto-saved UIDs: {uids}';

export const PERMISSION_DENIED_TEXT = '🚫 Lệnh này chỉ dành cho admin. / This command is for admins only.';
export const TRANSIENT_FAILURE_TEXT =
  '⏳ Facebook không phản hồi, thử lại sau. / Facebook did not respond in time, please try again later.';
export const STORAGE_FAILURE_TEXT = '❌ Lỗi cơ sở dữ liệu. / Database error, please try again later.';
export const UNEXPECTED_FAILURE_TEXT = '❌ Đã xảy ra lỗi. / Something went wrong.';

export const HELP_TEXT =
  'Các lệnh / Commands:\n' +
  '/save <uid>[|note] - lưu UID / save a UID\n' +
  '/find <text> - tìm / search\n' +
  '/check <uid> - kiểm tra / check if saved\n' +
  '/checkinfo <uid|link> - thông tin Facebook / Facebook profile\n' +
  '/photo <uid> - ảnh đại diện / profile picture\n' +
  '/getid - chat id & user id\n' +
  '/settings - cài đặt / your settings\n' +
  'Admin: /delete <uid> /deleteall /export /stats /notify on|off /notifytext <text>|reset\n\n' +
  'Gửi link Facebook để tự động lưu UID / Send a Facebook link to auto-save its UID.';

const FIND_LIMIT = 50;

type CommandContext = {
  message: InboundMessage;
  args: string[];
  rawArgs: string;
};

type CommandSpec = {
  admin: boolean;
  handler: (ctx: CommandContext) => Promise<Reply> | Reply;
};

export type DispatcherDeps = {
  config: AppConfig;
  store: UidStore;
  lookup: ProfileLookup;
  logger: Logger;
};

type ParsedCommand = {
  name: string;
  rawArgs: string;
};

const COMMAND_RE = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

export function parseCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(COMMAND_RE);
  if (!match) return null;
  return { name: match[1].toLowerCase(), rawArgs: (match[2] ?? '').trim() };
}

export function resolveCommandName(name: string): CommandName | null {
  const known = COMMAND_NAMES.find((command) => command === name);
  return known ?? COMMAND_ALIASES[name] ?? null;
}

function text(body: string, menu?: boolean): Reply {
  return menu ? { kind: 'text', text: body, menu } : { kind: 'text', text: body };
}

function formatTime(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Маршрутизация входящих сообщений: команда -> обработчик из закрытой таблицы,
 * иначе поиск ссылок Facebook и автосохранение.
 * Каждый вызов заканчивается ровно одним Reply, исключения наружу не выходят
 */
export class CommandDispatcher {
  private readonly commands: Readonly<Record<CommandName, CommandSpec>>;
  private readonly admins: ReadonlySet<number>;
  private readonly store: UidStore;
  private readonly lookup: ProfileLookup;
  private readonly logger: Logger;

  constructor(deps: DispatcherDeps) {
    this.store = deps.store;
    this.lookup = deps.lookup;
    this.logger = deps.logger.child({ module: 'dispatcher' });
    this.admins = new Set(deps.config.ADMIN_USER_IDS);

    this.commands = {
      start: { admin: false, handler: () => text('Xin chào! Chọn tác vụ từ menu / Choose an action:', true) },
      help: { admin: false, handler: () => text(HELP_TEXT) },
      getid: {
        admin: false,
        handler: ({ message }) => text(`Chat id: ${message.chatId}\nUser id: ${message.userId}`),
      },
      save: { admin: false, handler: (ctx) => this.handleSave(ctx) },
      find: { admin: false, handler: (ctx) => this.handleFind(ctx) },
      check: { admin: false, handler: (ctx) => this.handleCheck(ctx) },
      checkinfo: { admin: false, handler: (ctx) => this.handleCheckInfo(ctx) },
      photo: { admin: false, handler: (ctx) => this.handlePhoto(ctx) },
      settings: { admin: false, handler: (ctx) => this.handleSettings(ctx) },
      delete: { admin: true, handler: (ctx) => this.handleDelete(ctx) },
      deleteall: { admin: true, handler: (ctx) => this.handleDeleteAll(ctx) },
      export: { admin: true, handler: () => this.handleExport() },
      stats: { admin: true, handler: () => this.handleStats() },
      notify: { admin: true, handler: (ctx) => this.handleNotify(ctx) },
      notifytext: { admin: true, handler: (ctx) => this.handleNotifyText(ctx) },
    };
  }

  isAdmin(userId: number): boolean {
    return this.admins.has(userId);
  }

  async dispatch(message: InboundMessage): Promise<Reply> {
    try {
      const parsed = parseCommand(message.text);
      if (!parsed) {
        return await this.handleText(message);
      }

      const name = resolveCommandName(parsed.name);
      if (!name) {
        return text(`Lệnh không tồn tại / Unknown command: /${parsed.name}\nGõ /help / Type /help`);
      }
      return await this.runCommand(name, message, parsed.rawArgs);
    } catch (error) {
      return this.toErrorReply(error, message);
    }
  }

  async handleMenuAction(action: MenuAction, message: InboundMessage): Promise<Reply> {
    try {
      switch (action) {
        case 'save':
          return text('Gửi /save <uid> (hoặc /save uid|ghi chú) / Send /save <uid> (or /save uid|note)');
        case 'find':
          return text('Dùng /find <chuỗi> để tìm UID / Use /find <text> to search UIDs.');
        case 'delete':
          return text('Dùng /delete <uid> để xóa / Use /delete <uid> to delete.');
        case 'export':
        case 'stats':
        case 'settings':
        case 'help':
          return await this.runCommand(action, message, '');
      }
    } catch (error) {
      return this.toErrorReply(error, message);
    }
  }

  private async runCommand(name: CommandName, message: InboundMessage, rawArgs: string): Promise<Reply> {
    const spec = this.commands[name];
    // Проверка прав до обработчика: хранилище не трогается
    if (spec.admin && !this.isAdmin(message.userId)) {
      throw new PermissionError(name);
    }
    this.logger.debug({ command: name, userId: message.userId, chatId: message.chatId }, 'Command received');
    const args = rawArgs.split(/\s+/).filter(Boolean);
    return spec.handler({ message, args, rawArgs });
  }

  /**
   * Обычный текст: ищем ссылки Facebook и сохраняем найденные UID
   */
  private async handleText(message: InboundMessage): Promise<Reply> {
    const links = findFacebookLinks(message.text);
    if (links.length === 0) {
      return { kind: 'none' };
    }

    const saved: string[] = [];
    const existing: string[] = [];
    const failed: string[] = [];
    let transientFailure = false;

    for (const link of links) {
      const resolution = await resolveLinkResult(link, this.lookup);
      if (!resolution.ok) {
        transientFailure = transientFailure || resolution.transient;
        failed.push(link.kind === 'vanity' ? link.username : link.url);
        continue;
      }

      const result = this.store.saveWithStatus(resolution.uid, message.userId, link.url, { chatId: message.chatId });
      (result.isNew ? saved : existing).push(result.record.uid);
    }

    this.logger.info(
      { userId: message.userId, chatId: message.chatId, saved, existing, failed },
      'Facebook links processed'
    );

    const settings = this.store.getSettings(message.userId);
    if (!settings.notifyEnabled) {
      return { kind: 'none' };
    }

    if (saved.length === 0 && existing.length === 0) {
      return text(
        transientFailure
          ? TRANSIENT_FAILURE_TEXT
          : `❓ Không thể xác định UID / Could not resolve a UID for: ${failed.join(', ')}`
      );
    }

    const lines: string[] = [];
    if (saved.length) {
      const template = settings.notificationText ?? DEFAULT_NOTIFICATION_TEXT;
      lines.push(template.replace(/\{uids\}/g, saved.join(', ')));
    }
    if (existing.length) {
      lines.push(`Đã có sẵn / Already saved: ${existing.join(', ')}`);
    }
    if (failed.length) {
      lines.push(`Không thể xác định / Could not resolve: ${failed.join(', ')}`);
    }
    return text(lines.join('\n'));
  }

  /**
   * UID из аргумента команды. withLookup = false: только UID или ссылка с id,
   * чтобы обработчик не делал второй запрос к Facebook
   */
  private async resolveTarget(arg: string | undefined, usage: string, withLookup: boolean): Promise<UidArgument> {
    if (!arg?.trim()) {
      throw new ValidationError(usage);
    }
    return parseUidArgument(arg, withLookup ? this.lookup : undefined);
  }

  private async handleSave({ message, rawArgs }: CommandContext): Promise<Reply> {
    const [target, ...noteParts] = rawArgs.split('|');
    const note = noteParts.join('|').trim() || null;
    const { uid, source } = await this.resolveTarget(target, 'Dùng: /save <uid>[|ghi chú] / Use: /save <uid>[|note]', true);

    const { record, isNew } = this.store.saveWithStatus(uid, message.userId, source, {
      note,
      chatId: message.chatId,
    });
    if (isNew) {
      return text(`Đã lưu UID / Saved UID: ${record.uid}`);
    }
    return text(`UID ${record.uid} đã có / already saved (${formatTime(record.createdAt)})`);
  }

  private handleFind({ message, rawArgs }: CommandContext): Reply {
    if (!rawArgs) {
      throw new ValidationError('Dùng: /find <chuỗi> / Use: /find <text>');
    }
    const rows = this.store.find(rawArgs, { chatId: message.chatId }, FIND_LIMIT);
    if (rows.length === 0) {
      return text('Không tìm thấy / No results.');
    }
    return text(rows.map((r) => `${r.uid} — ${r.note ?? '-'} (saved: ${formatTime(r.createdAt)})`).join('\n'));
  }

  private async handleCheck({ args }: CommandContext): Promise<Reply> {
    const { uid } = await this.resolveTarget(args[0], 'Dùng: /check <uid> / Use: /check <uid>', true);
    const record = this.store.get(uid);
    return text(record ? `✅ ${uid}: Đã có / Exists.` : `➖ ${uid}: Chưa có / Not found.`);
  }

  private async handleCheckInfo({ args }: CommandContext): Promise<Reply> {
    const { uid } = await this.resolveTarget(args[0], 'Dùng: /checkinfo <uid|link> / Use: /checkinfo <uid|link>', false);
    const profile = await this.lookup.getProfile(uid);
    const lines = [`UID: ${profile.id}`];
    if (profile.name) lines.push(`Name: ${profile.name}`);
    if (profile.link) lines.push(`Link: ${profile.link}`);
    return text(lines.join('\n'));
  }

  private async handlePhoto({ args }: CommandContext): Promise<Reply> {
    const { uid } = await this.resolveTarget(args[0], 'Dùng: /photo <uid> / Use: /photo <uid>', false);
    try {
      const profile = await this.lookup.getProfile(uid);
      if (profile.pictureUrl) {
        return { kind: 'photo', url: profile.pictureUrl, caption: profile.name ? `Name: ${profile.name}` : undefined };
      }
    } catch (error) {
      if (!(error instanceof ExternalLookupError)) throw error;
      this.logger.debug({ uid, error: error.message }, 'Profile lookup failed, using public picture URL');
    }
    return { kind: 'photo', url: this.lookup.pictureUrl(uid) };
  }

  private handleSettings({ message }: CommandContext): Reply {
    const settings = this.store.getSettings(message.userId);
    return text(
      `⚙️ Cài đặt / Settings\n` +
        `Thông báo / Notifications: ${settings.notifyEnabled ? 'bật / on' : 'tắt / off'}\n` +
        `Mẫu / Template: ${settings.notificationText ?? DEFAULT_NOTIFICATION_TEXT}\n` +
        `Admin: ${this.isAdmin(message.userId) ? 'yes' : 'no'}`
    );
  }

  private handleDelete({ args }: CommandContext): Reply {
    if (!args[0]) {
      throw new ValidationError('Dùng: /delete <uid> / Use: /delete <uid>');
    }
    const removed = this.store.delete(args[0]);
    return text(removed ? `Đã xóa / Deleted: ${args[0]}` : 'Không tìm thấy UID / Not found.');
  }

  private handleDeleteAll({ message }: CommandContext): Reply {
    const removed = this.store.deleteByChat(message.chatId);
    this.logger.info({ chatId: message.chatId, removed }, 'Chat UIDs removed');
    return text(`Đã xoá ${removed} UID trong chat / Removed ${removed} UIDs from this chat.`);
  }

  private handleExport(): Reply {
    const records = this.store.exportAll();
    if (records.length === 0) {
      return text('Không có UID / No UIDs.');
    }
    return {
      kind: 'document',
      filename: exportFilename(),
      content: Buffer.from(recordsToCsv(records), 'utf8'),
      caption: `📤 ${records.length} UID`,
    };
  }

  private handleStats(): Reply {
    const stats = this.store.stats();
    return text(
      `Tổng UID / Total UIDs: ${stats.total}\n` +
        `Người gửi / Submitters: ${stats.submitters}\n` +
        `Lưu gần nhất / Last saved: ${stats.lastSavedAt === null ? '-' : formatTime(stats.lastSavedAt)}`
    );
  }

  private handleNotify({ message, args }: CommandContext): Reply {
    const value = args[0]?.toLowerCase();
    if (value !== 'on' && value !== 'off') {
      throw new ValidationError('Dùng: /notify on|off / Use: /notify on|off');
    }
    const settings = this.store.setNotifyEnabled(message.userId, value === 'on');
    return text(`Thông báo / Notifications: ${settings.notifyEnabled ? 'bật / on' : 'tắt / off'}`);
  }

  private handleNotifyText({ message, rawArgs }: CommandContext): Reply {
    if (!rawArgs) {
      throw new ValidationError('Dùng: /notifytext <text>|reset, {uids} = danh sách UID / Use: /notifytext <text>|reset, {uids} = saved UIDs');
    }
    const reset = rawArgs.toLowerCase() === 'reset';
    const settings = this.store.setNotificationText(message.userId, reset ? null : rawArgs);
    return text(`Mẫu thông báo / Notification template: ${settings.notificationText ?? DEFAULT_NOTIFICATION_TEXT}`);
  }

  private toErrorReply(error: unknown, message: InboundMessage): Reply {
    if (error instanceof PermissionError) {
      this.logger.info({ userId: message.userId, command: error.command }, 'Permission denied');
      return text(PERMISSION_DENIED_TEXT);
    }
    if (error instanceof ValidationError) {
      return text(`⚠️ ${error.message}`);
    }
    if (error instanceof ExternalLookupError) {
      return text(error.transient ? TRANSIENT_FAILURE_TEXT : `❓ Không có thông tin / No info: ${error.message}`);
    }
    if (error instanceof StorageError) {
      this.logger.error({ error: error.message, userId: message.userId }, 'Storage failure');
      return text(STORAGE_FAILURE_TEXT);
    }
    this.logger.error({ error: toError(error).message, userId: message.userId }, 'Unexpected dispatcher error');
    return text(UNEXPECTED_FAILURE_TEXT);
  }
}
