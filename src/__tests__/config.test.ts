import { loadConfig, parseIdList } from '../config';

describe('parseIdList', () => {
  it('should parse comma-separated ids and skip junk', () => {
    expect(parseIdList('1, 2,abc,2, 42,')).toEqual([1, 2, 42]);
  });

  it('should return an empty list for missing input', () => {
    expect(parseIdList(undefined)).toEqual([]);
    expect(parseIdList('')).toEqual([]);
  });
});

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token' });

    expect(config).toEqual({
      TELEGRAM_BOT_TOKEN: 'test-token',
      ADMIN_USER_IDS: [],
      FB_ACCESS_TOKEN: undefined,
      FB_GRAPH_VERSION: 'v17.0',
      DB_PATH: 'data/uids.db',
      REQUEST_TIMEOUT_MS: 10000,
      LOG_LEVEL: 'info',
      NODE_ENV: 'development',
    });
  });

  it('should parse admins, coerce numbers and drop a blank access token', () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: 'test-token',
      ADMIN_USER_IDS: '10,20',
      FB_ACCESS_TOKEN: '   ',
      REQUEST_TIMEOUT_MS: '2500',
      LOG_LEVEL: 'debug',
    });

    expect(config.ADMIN_USER_IDS).toEqual([10, 20]);
    expect(config.FB_ACCESS_TOKEN).toBeUndefined();
    expect(config.REQUEST_TIMEOUT_MS).toBe(2500);
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('should return a frozen object', () => {
    const config = loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token', ADMIN_USER_IDS: '1' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.ADMIN_USER_IDS)).toBe(true);
  });

  it('should report a missing bot token', () => {
    expect(() => loadConfig({})).toThrow('Invalid environment configuration: TELEGRAM_BOT_TOKEN: Required');
  });

  it('should report invalid numbers', () => {
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token', REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      /REQUEST_TIMEOUT_MS/
    );
  });
});
