/**
 * Default configuration values.
 * Applied to any field a config file leaves unset or zero.
 */

export const CLIENT_DEFAULTS = {
  TIMEOUT_MS: 30_000,
  RETRIES: 3,
  RATE_LIMIT_STRATEGY: 'adaptive',
  BACKOFF_BASE_MS: 1_000,
  BACKOFF_MAX_MS: 60_000,
} as const;

export const LOGGING_DEFAULTS = {
  LEVEL: 'info',
  FORMAT: 'json',
  OUTPUT: 'stderr',
} as const;

export const ENV_VARS = {
  BOT_TOKEN: 'DISCORD_BOT_TOKEN',
  APPLICATION_ID: 'DISCORD_APPLICATION_ID',
  WEBHOOK: 'DISCORD_WEBHOOK',
  RATE_LIMIT_STRATEGY: 'DISCORD_RATE_LIMIT_STRATEGY',
  LOG_LEVEL: 'DISCORD_LOG_LEVEL',
} as const;

/** Label of the webhook that `--webhook` overrides. */
export const DEFAULT_WEBHOOK = 'default';

/** Probed in order, relative to the working directory, when `--config` is absent. */
export const CONFIG_SEARCH_PATHS = [
  'discord-config.yaml',
  'discord.yaml',
  'config/discord.yaml',
] as const;
