import { resolve } from 'node:path';
import { z } from 'zod';
import type { NotificationConfig } from './infrastructure/notifications/index.js';
import { DEFAULT_TIMEOUT_MS } from './infrastructure/notifications/index.js';

/**
 * Process configuration, read once at startup and passed explicitly.
 * Nothing below `buildApp` reads `process.env`.
 */
export interface AppConfig {
  readonly service_name: string;
  readonly host: string;
  readonly port: number;
  readonly trust_proxy: boolean;
  readonly log_level: LogLevel;
  readonly store_path: string;
  readonly throttle: { readonly max_per_minute: number };
  readonly notifications: NotificationConfig;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  SERVICE_NAME: z.string().default('login-logger'),
  BIND: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4567),
  TRUST_PROXY: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STORE_PATH: z.string().default('logs.jsonl'),
  THROTTLE_MAX_PER_MIN: z.coerce.number().int().min(0).default(60),
  DISCORD_WEBHOOK_URL: z.string().url().optional(),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Trims every value; blank values count as unset. */
function normalizeEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    out[key] = trimmed === '' ? undefined : trimmed;
  }
  return out;
}

/**
 * Builds the immutable app configuration from environment variables.
 *
 * Relative `STORE_PATH` values resolve against `cwd`. Throws
 * `ConfigError` listing every invalid variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = envSchema.safeParse(normalizeEnv(env));

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;

  return Object.freeze({
    service_name: e.SERVICE_NAME,
    host: e.BIND,
    port: e.PORT,
    trust_proxy: e.TRUST_PROXY,
    log_level: e.LOG_LEVEL,
    store_path: resolve(cwd, e.STORE_PATH),
    throttle: Object.freeze({ max_per_minute: e.THROTTLE_MAX_PER_MIN }),
    notifications: Object.freeze({
      discord: Object.freeze({
        webhook_url: e.DISCORD_WEBHOOK_URL ?? null,
        timeout_ms: e.NOTIFY_TIMEOUT_MS,
      }),
      telegram: Object.freeze({
        bot_token: e.TELEGRAM_BOT_TOKEN ?? null,
        chat_id: e.TELEGRAM_CHAT_ID ?? null,
        api_url: e.TELEGRAM_API_URL,
        timeout_ms: e.NOTIFY_TIMEOUT_MS,
      }),
    }),
  });
}
