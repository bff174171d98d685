import { z } from 'zod';

const HOUR_SECONDS = 60 * 60;

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PRICE_API_BASE_URL: z.string().url().default('https://lite-api.jup.ag'),
  USER_PREFS_FILE: z.string().min(1).optional()
});

export type AppConfig = z.infer<typeof envSchema>;

export const expiryBySignalClassSchema = z
  .object({
    discovery: z.number().int().positive().default(24 * HOUR_SECONDS),
    alpha: z.number().int().positive().default(168 * HOUR_SECONDS),
    manual: z.number().int().positive().default(365 * 24 * HOUR_SECONDS)
  })
  .strict();

/**
 * Engine tuning. Durations are in seconds, money in USD, thresholds in percent.
 */
export const engineConfigSchema = z
  .object({
    pageSize: z.number().int().positive().max(100).default(10),
    hardCapUsd: z.number().finite().positive().default(150),
    defaultTakeProfitPercent: z.number().finite().positive().default(50),
    defaultReservePercent: z.number().finite().min(0).max(100).default(0),
    monitorIntervalSeconds: z.number().int().positive().default(30),
    expiryBySignalClass: expiryBySignalClassSchema.default({}),
    startingCapitalUsd: z.number().finite().positive().default(1000),
    minTradeUsd: z.number().finite().nonnegative().default(10),
    syncIntervalSeconds: z.number().int().positive().default(60),
    signalMaxAgeSeconds: z.number().int().positive().default(15 * 60),
    maxQuoteAgeSeconds: z.number().int().positive().default(5 * 60),
    smartQuantileReach: z.number().gt(0).max(1).default(0.75),
    reentryCooldownSeconds: z.number().int().nonnegative().default(0),
    outcomeRefreshSeconds: z.number().int().positive().default(10 * 60)
  })
  .strict();

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

const ENGINE_ENV_KEYS: Record<Exclude<keyof EngineConfig, 'expiryBySignalClass'>, string> = {
  pageSize: 'ENGINE_PAGE_SIZE',
  hardCapUsd: 'ENGINE_HARD_CAP_USD',
  defaultTakeProfitPercent: 'ENGINE_DEFAULT_TAKE_PROFIT_PERCENT',
  defaultReservePercent: 'ENGINE_DEFAULT_RESERVE_PERCENT',
  monitorIntervalSeconds: 'ENGINE_MONITOR_INTERVAL_SECONDS',
  startingCapitalUsd: 'ENGINE_STARTING_CAPITAL_USD',
  minTradeUsd: 'ENGINE_MIN_TRADE_USD',
  syncIntervalSeconds: 'ENGINE_SYNC_INTERVAL_SECONDS',
  signalMaxAgeSeconds: 'ENGINE_SIGNAL_MAX_AGE_SECONDS',
  maxQuoteAgeSeconds: 'ENGINE_MAX_QUOTE_AGE_SECONDS',
  smartQuantileReach: 'ENGINE_SMART_QUANTILE_REACH',
  reentryCooldownSeconds: 'ENGINE_REENTRY_COOLDOWN_SECONDS',
  outcomeRefreshSeconds: 'ENGINE_OUTCOME_REFRESH_SECONDS'
};

export const EXPIRY_ENV_KEY = 'ENGINE_EXPIRY_BY_SIGNAL_CLASS';

/** Maps `ENGINE_*` variables onto the raw engine config input; unset keys fall back to schema defaults. */
export function engineConfigInputFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  for (const [field, envKey] of Object.entries(ENGINE_ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }

    input[field] = Number(raw);
  }

  const expiryRaw = env[EXPIRY_ENV_KEY];
  if (expiryRaw && expiryRaw.trim() !== '') {
    try {
      input.expiryBySignalClass = JSON.parse(expiryRaw);
    } catch {
      throw new Error(`${EXPIRY_ENV_KEY} must be a JSON object of seconds per signal class`);
    }
  }

  return input;
}
