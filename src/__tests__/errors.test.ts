import { BotError, ExternalLookupError, PermissionError, StorageError, ValidationError, toError } from '../errors';

describe('errors', () => {
  it('should keep the class chain and codes', () => {
    const cause = new Error('disk full');
    const error = new StorageError('Failed to save uid', cause);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toBeInstanceOf(BotError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('STORAGE');
    expect(error.name).toBe('StorageError');
    expect(error.cause).toBe(cause);
  });

  it('should describe the denied command', () => {
    const error = new PermissionError('export');

    expect(error.command).toBe('export');
    expect(error.message).toBe('Command /export requires admin rights');
    expect(error.code).toBe('PERMISSION');
  });

  it('should carry the transient flag', () => {
    expect(new ExternalLookupError('timeout', true).transient).toBe(true);
    expect(new ValidationError('bad').code).toBe('VALIDATION');
  });

  it('should wrap non-errors', () => {
    expect(toError('boom').message).toBe('boom');
    const original = new Error('x');
    expect(toError(original)).toBe(original);
  });
});
