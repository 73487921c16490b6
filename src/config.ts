import { z } from 'zod';

/**
 * Разбирает список id через запятую, нечисловые значения пропускаются
 */
export function parseIdList(raw: string | undefined): number[] {
  if (!raw) return [];
  const ids = new Set<number>();
  for (const part of raw.split(',')) {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    ids.add(Number(trimmed));
  }
  return [...ids];
}

const emptyToUndefined = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  ADMIN_USER_IDS: z.string().optional().transform(parseIdList),
  FB_ACCESS_TOKEN: z.string().optional().transform(emptyToUndefined),
  FB_GRAPH_VERSION: z.string().regex(/^v\d+\.\d+$/).default('v17.0'),
  DB_PATH: z.string().min(1).default('data/uids.db'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

export type AppConfig = Readonly<Omit<Env, 'ADMIN_USER_IDS'> & { ADMIN_USER_IDS: readonly number[] }>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => (messages?.length ? `${key}: ${messages.join(', ')}` : null))
      .filter((line): line is string => line !== null)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return Object.freeze({
    ...parsed.data,
    ADMIN_USER_IDS: Object.freeze([...parsed.data.ADMIN_USER_IDS]),
  });
}
