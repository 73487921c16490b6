import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StorageError, ValidationError, toError } from './errors';
import type { ListFilter, SaveMeta, SaveResult, StoreStats, UidRecord, UserSettings } from './types';

export type Db = Database.Database;

const UID_PATTERN = /^\d{1,20}$/;

export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    // Ensure data directory exists if using relative default path
    const resolved = path.resolve(process.cwd(), dbPath);
    const dbDir = path.dirname(resolved);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
    dbPath = resolved;
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');
  return db;
}

export function initSchema(db: Db): void {
  const createSql = `
  CREATE TABLE IF NOT EXISTS uids (
    uid TEXT PRIMARY KEY,
    note TEXT,
    source TEXT,
    submitted_by INTEGER NOT NULL,
    chat_id INTEGER NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_uids_submitted_by ON uids(submitted_by, created_at);
  CREATE INDEX IF NOT EXISTS idx_uids_chat ON uids(chat_id);

  CREATE TABLE IF NOT EXISTS user_settings (
    user_id INTEGER PRIMARY KEY,
    notify_enabled INTEGER NOT NULL DEFAULT 1,
    notification_text TEXT,
    updated_at INTEGER NOT NULL
  );
  `;

  db.exec(createSql);
}

type UidRow = {
  uid: string;
  note: string | null;
  source: string | null;
  submitted_by: number;
  chat_id: number;
  created_at: number;
  notify_enabled: number;
};

type SettingsRow = {
  notify_enabled: number;
  notification_text: string | null;
};

const SELECT_RECORD = `
  SELECT u.uid, u.note, u.source, u.submitted_by, u.chat_id, u.created_at,
         COALESCE(s.notify_enabled, 1) AS notify_enabled
  FROM uids u
  LEFT JOIN user_settings s ON s.user_id = u.submitted_by`;

// Пустой фильтр = все записи
const FILTER_CLAUSE = `(@submitted_by IS NULL OR u.submitted_by = @submitted_by)
  AND (@chat_id IS NULL OR u.chat_id = @chat_id)`;

function filterParams(filter: ListFilter): { submitted_by: number | null; chat_id: number | null } {
  return {
    submitted_by: filter.submittedBy ?? null,
    chat_id: filter.chatId ?? null,
  };
}

function toRecord(row: UidRow): UidRecord {
  return {
    uid: row.uid,
    submittedBy: row.submitted_by,
    chatId: row.chat_id,
    source: row.source,
    note: row.note,
    createdAt: row.created_at,
    notifyEnabled: row.notify_enabled === 1,
  };
}

export function assertUid(uid: string): string {
  const trimmed = uid.trim();
  if (!UID_PATTERN.test(trimmed)) {
    throw new ValidationError(`"${uid}" is not a numeric Facebook UID`);
  }
  return trimmed;
}

/** Экранирует % и _ для LIKE ... ESCAPE '\' */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Хранилище UID поверх одной таблицы SQLite.
 * better-sqlite3 синхронный, так что запись сериализуется самим соединением;
 * между процессами спасают WAL и busy_timeout.
 */
export class UidStore {
  constructor(private readonly db: Db) {}

  save(uid: string, submittedBy: number, source: string | null = null, meta: SaveMeta = {}): UidRecord {
    return this.saveWithStatus(uid, submittedBy, source, meta).record;
  }

  saveWithStatus(uid: string, submittedBy: number, source: string | null = null, meta: SaveMeta = {}): SaveResult {
    const normalized = assertUid(uid);
    return this.guard('save uid', () => {
      const tx = this.db.transaction((): SaveResult => {
        // Существующая запись не трогается: created_at неизменен
        const info = this.db
          .prepare(
            `INSERT INTO uids (uid, note, source, submitted_by, chat_id, created_at)
             VALUES (@uid, @note, @source, @submitted_by, @chat_id, @created_at)
             ON CONFLICT(uid) DO NOTHING`
          )
          .run({
            uid: normalized,
            note: meta.note ?? null,
            source,
            submitted_by: submittedBy,
            chat_id: meta.chatId ?? submittedBy,
            created_at: Date.now(),
          });
        const row = this.db.prepare(`${SELECT_RECORD} WHERE u.uid = ?`).get(normalized) as UidRow | undefined;
        if (!row) {
          throw new Error(`Row for uid ${normalized} vanished after insert`);
        }
        return { record: toRecord(row), isNew: info.changes > 0 };
      });
      return tx.immediate();
    });
  }

  delete(uid: string): boolean {
    const normalized = assertUid(uid);
    return this.guard('delete uid', () => {
      const info = this.db.prepare('DELETE FROM uids WHERE uid = ?').run(normalized);
      return info.changes > 0;
    });
  }

  deleteByChat(chatId: number): number {
    return this.guard('delete chat uids', () => {
      const info = this.db.prepare('DELETE FROM uids WHERE chat_id = ?').run(chatId);
      return info.changes;
    });
  }

  get(uid: string): UidRecord | null {
    const normalized = assertUid(uid);
    return this.guard('read uid', () => {
      const row = this.db.prepare(`${SELECT_RECORD} WHERE u.uid = ?`).get(normalized) as UidRow | undefined;
      return row ? toRecord(row) : null;
    });
  }

  find(query: string, filter: ListFilter = {}, limit: number = 50): UidRecord[] {
    const pattern = `%${escapeLike(query.trim())}%`;
    return this.guard('search uids', () => {
      const rows = this.db
        .prepare(
          `${SELECT_RECORD}
           WHERE ${FILTER_CLAUSE}
             AND (u.uid LIKE @pattern ESCAPE '\\' OR u.note LIKE @pattern ESCAPE '\\')
           ORDER BY u.created_at ASC, u.rowid ASC
           LIMIT @limit`
        )
        .all({ ...filterParams(filter), pattern, limit }) as UidRow[];
      return rows.map(toRecord);
    });
  }

  list(filter: ListFilter = {}): UidRecord[] {
    return this.guard('list uids', () => {
      const rows = this.db
        .prepare(`${SELECT_RECORD} WHERE ${FILTER_CLAUSE} ORDER BY u.created_at ASC, u.rowid ASC`)
        .all(filterParams(filter)) as UidRow[];
      return rows.map(toRecord);
    });
  }

  count(filter: ListFilter = {}): number {
    return this.guard('count uids', () => {
      const result = this.db
        .prepare(`SELECT COUNT(*) AS count FROM uids u WHERE ${FILTER_CLAUSE}`)
        .get(filterParams(filter)) as { count: number };
      return result.count;
    });
  }

  exportAll(): UidRecord[] {
    return this.list();
  }

  stats(): StoreStats {
    return this.guard('read stats', () => {
      const result = this.db
        .prepare(
          `SELECT COUNT(*) AS total, COUNT(DISTINCT submitted_by) AS submitters, MAX(created_at) AS last_saved_at
           FROM uids`
        )
        .get() as { total: number; submitters: number; last_saved_at: number | null };
      return {
        total: result.total,
        submitters: result.submitters,
        lastSavedAt: result.last_saved_at,
      };
    });
  }

  getSettings(userId: number): UserSettings {
    return this.guard('read settings', () => {
      const row = this.db
        .prepare('SELECT notify_enabled, notification_text FROM user_settings WHERE user_id = ?')
        .get(userId) as SettingsRow | undefined;

      if (!row) {
        // Настройки по умолчанию
        return { userId, notifyEnabled: true, notificationText: null };
      }

      return {
        userId,
        notifyEnabled: row.notify_enabled === 1,
        notificationText: row.notification_text,
      };
    });
  }

  setNotifyEnabled(userId: number, enabled: boolean): UserSettings {
    return this.guard('update settings', () => {
      this.db
        .prepare(
          `INSERT INTO user_settings (user_id, notify_enabled, updated_at)
           VALUES (@user_id, @notify_enabled, @updated_at)
           ON CONFLICT(user_id) DO UPDATE SET notify_enabled = excluded.notify_enabled, updated_at = excluded.updated_at`
        )
        .run({ user_id: userId, notify_enabled: enabled ? 1 : 0, updated_at: Date.now() });
      return this.getSettings(userId);
    });
  }

  setNotificationText(userId: number, text: string | null): UserSettings {
    return this.guard('update settings', () => {
      this.db
        .prepare(
          `INSERT INTO user_settings (user_id, notification_text, updated_at)
           VALUES (@user_id, @notification_text, @updated_at)
           ON CONFLICT(user_id) DO UPDATE SET notification_text = excluded.notification_text, updated_at = excluded.updated_at`
        )
        .run({ user_id: userId, notification_text: text, updated_at: Date.now() });
      return this.getSettings(userId);
    });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      const cause = toError(error);
      throw new StorageError(`Failed to ${operation}: ${cause.message}`, cause);
    }
  }
}
