export const BOT_ERROR_CODES = {
  VALIDATION: 'VALIDATION',
  PERMISSION: 'PERMISSION',
  STORAGE: 'STORAGE',
  EXTERNAL_LOOKUP: 'EXTERNAL_LOOKUP',
} as const;

export type BotErrorCode = (typeof BOT_ERROR_CODES)[keyof typeof BOT_ERROR_CODES];

export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: BotErrorCode,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'BotError';
    Object.setPrototypeOf(this, BotError.prototype);
  }
}

/** Неверный UID или аргумент команды */
export class ValidationError extends BotError {
  constructor(message: string) {
    super(message, BOT_ERROR_CODES.VALIDATION);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** Команда только для админов */
export class PermissionError extends BotError {
  constructor(public readonly command: string) {
    super(`Command /${command} requires admin rights`, BOT_ERROR_CODES.PERMISSION);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

export class StorageError extends BotError {
  constructor(message: string, cause?: Error) {
    super(message, BOT_ERROR_CODES.STORAGE, cause);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

/**
 * Ошибка обращения к Facebook.
 * transient = таймаут, сеть или 5xx: можно повторить позже вручную
 */
export class ExternalLookupError extends BotError {
  constructor(
    message: string,
    public readonly transient: boolean,
    cause?: Error
  ) {
    super(message, BOT_ERROR_CODES.EXTERNAL_LOOKUP, cause);
    this.name = 'ExternalLookupError';
    Object.setPrototypeOf(this, ExternalLookupError.prototype);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
