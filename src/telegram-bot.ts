import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from './config';
import { initSchema, openDatabase, UidStore } from './db';
import { CommandDispatcher } from './dispatcher';
import { toError } from './errors';
import { FacebookClient } from './facebook';
import { HttpClient } from './http';
import { TelegramBot } from './telegram';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = pino({ level: config.LOG_LEVEL });

  const db = openDatabase(config.DB_PATH);
  initSchema(db);
  logger.info({ env: config.NODE_ENV, dbPath: config.DB_PATH, admins: config.ADMIN_USER_IDS.length }, 'Telegram bot starting...');

  if (config.ADMIN_USER_IDS.length === 0) {
    logger.warn('ADMIN_USER_IDS is empty: admin commands are disabled');
  }

  const http = new HttpClient({ timeoutMs: config.REQUEST_TIMEOUT_MS });
  const facebook = new FacebookClient(
    http,
    { accessToken: config.FB_ACCESS_TOKEN, graphVersion: config.FB_GRAPH_VERSION },
    logger
  );
  const dispatcher = new CommandDispatcher({ config, store: new UidStore(db), lookup: facebook, logger });
  const telegramBot = new TelegramBot(config, dispatcher, logger);

  // Обработка сигналов для корректного завершения
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    telegramBot.stop(signal);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await telegramBot.start();
  } finally {
    db.close();
    logger.info('Database closed');
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start Telegram bot:', toError(error).message);
  process.exit(1);
});
