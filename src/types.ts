export type UidRecord = {
  uid: string;
  submittedBy: number;
  chatId: number;
  source: string | null;
  note: string | null;
  createdAt: number;
  notifyEnabled: boolean;
};

export type SaveMeta = {
  note?: string | null;
  chatId?: number;
};

export type SaveResult = {
  record: UidRecord;
  isNew: boolean;
};

export type ListFilter = {
  submittedBy?: number;
  chatId?: number;
};

export type StoreStats = {
  total: number;
  submitters: number;
  lastSavedAt: number | null;
};

export type UserSettings = {
  userId: number;
  notifyEnabled: boolean;
  notificationText: string | null;
};

export type FacebookProfile = {
  id: string;
  name?: string;
  link?: string;
  pictureUrl?: string;
};

/**
 * Внешний поиск по Facebook. Реализуется FacebookClient, в тестах подменяется
 */
export interface ProfileLookup {
  resolveUsername(username: string): Promise<string>;
  getProfile(uid: string): Promise<FacebookProfile>;
  pictureUrl(uid: string): string;
}

export type InboundMessage = {
  chatId: number;
  userId: number;
  text: string;
};

export type Reply =
  | { kind: 'text'; text: string; menu?: boolean }
  | { kind: 'document'; filename: string; content: Buffer; caption?: string }
  | { kind: 'photo'; url: string; caption?: string }
  | { kind: 'none' };
