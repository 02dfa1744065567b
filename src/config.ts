import path from 'path';
import { z } from 'zod';
import { AppConfig } from './types';

export const DEFAULT_DATA_DIR = path.join(__dirname, '../data');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const positiveNumber = (fallback: number) =>
  optionalString.pipe(z.coerce.number().positive().optional()).transform(value => value ?? fallback);

const EnvSchema = z.object({
  SLACK_BOT_TOKEN: optionalString,
  SLACK_SIGNING_SECRET: optionalString,
  SLACK_APP_TOKEN: optionalString,
  SOCKET_MODE: optionalString.transform(value => value?.toLowerCase() === 'true'),
  PORT: optionalString.pipe(z.coerce.number().int().min(1).max(65535).optional()),
  DATA_DIR: optionalString,
  FOOD_LIST_PATH: optionalString,
  FOOD_CACHE_PATH: optionalString,
  DEBT_DB_PATH: optionalString,
  FOOD_CACHE_HOURS: positiveNumber(12),
  RESTRICTED_USERS: optionalString,
  RESTRICTED_MESSAGE: optionalString,
  MAX_MESSAGE_LENGTH: optionalString.pipe(z.coerce.number().int().positive().optional())
});

/**
 * Build the app configuration from environment variables
 */
export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const dataDir = path.resolve(vars.DATA_DIR ?? DEFAULT_DATA_DIR);
  const restrictedUsers = (vars.RESTRICTED_USERS ?? 'PhuongTung99')
    .split(',')
    .map(user => user.trim())
    .filter(user => user.length > 0);

  return {
    slack: {
      botToken: vars.SLACK_BOT_TOKEN,
      signingSecret: vars.SLACK_SIGNING_SECRET,
      appToken: vars.SLACK_APP_TOKEN,
      socketMode: vars.SOCKET_MODE
    },
    port: vars.PORT ?? 3000,
    foodListPath: path.resolve(vars.FOOD_LIST_PATH ?? path.join(dataDir, 'foods.txt')),
    foodCachePath: path.resolve(vars.FOOD_CACHE_PATH ?? path.join(dataDir, 'food_cache.json')),
    debtDbPath: path.resolve(vars.DEBT_DB_PATH ?? path.join(dataDir, 'debts.json')),
    foodCacheHours: vars.FOOD_CACHE_HOURS,
    restrictedUsers,
    restrictedMessage: vars.RESTRICTED_MESSAGE ?? 'You need a VIP membership to use this command.',
    maxMessageLength: vars.MAX_MESSAGE_LENGTH ?? 4000
  };
}
