import { z } from 'zod';
import type { Config } from './types.js';

const DEFAULT_PRICE_URL = 'https://play.myfly.club/oil-prices';

const intFromEnv = (fallback: string, min: number) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().min(min));

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1),
  DISCORD_CLIENT_ID: z.string().min(1).optional(),
  DISCORD_GUILD_ID: z.string().min(1).optional(),
  PRICE_CHANNEL_ID: z.string().regex(/^\d+$/, 'must be a numeric channel id'),
  PRICE_URL: z.string().url().default(DEFAULT_PRICE_URL),
  POLL_INTERVAL_MS: intFromEnv('300000', 10_000),
  HTTP_TIMEOUT_MS: intFromEnv('10000', 100),
  FETCH_MAX_ATTEMPTS: intFromEnv('3', 1),
  FETCH_RETRY_DELAY_MS: intFromEnv('1000', 0),
  CHANNEL_NAME_PREFIX: z.string().min(1).max(80).default('oil-price'),
  COMMAND_PREFIX: z.string().min(1).max(5).default('!'),
  BOT_STATUS: z.string().min(1).default('Monitoring Oil Prices'),
  STATE_FILE: z.string().min(1).default('./data/poll-state.json'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const env = result.data;

  return {
    discord: {
      token: env.DISCORD_TOKEN,
      clientId: env.DISCORD_CLIENT_ID,
      guildId: env.DISCORD_GUILD_ID,
      priceChannelId: env.PRICE_CHANNEL_ID,
      commandPrefix: env.COMMAND_PREFIX,
      statusText: env.BOT_STATUS,
    },
    source: {
      url: env.PRICE_URL,
      timeoutMs: env.HTTP_TIMEOUT_MS,
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      retryDelayMs: env.FETCH_RETRY_DELAY_MS,
    },
    monitoring: {
      pollIntervalMs: env.POLL_INTERVAL_MS,
      channelNamePrefix: env.CHANNEL_NAME_PREFIX,
      stateFile: env.STATE_FILE,
    },
    logLevel: env.LOG_LEVEL,
  };
}
