import { z } from 'zod';

import { parseDuration } from '../config/duration.js';
import { errorMessage } from '../errors/index.js';

// ── Scalars ─────────────────────────────────────────────────
// The loader swaps string-typed fields back to their source text before
// validation; the coercion here covers anything it could not reach, such as
// an alias to a number.

const scalarStringSchema = z
  .union([z.string(), z.number(), z.bigint(), z.boolean()])
  .transform((value) => String(value));

const integerSchema = z
  .union([z.number().int(), z.bigint()])
  .transform((value) => Number(value));

export const durationSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .transform((value, ctx) => {
    if (typeof value !== 'string') {
      const ms = Number(value);
      if (!Number.isFinite(ms)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'duration must be a finite number of milliseconds',
        });
        return z.NEVER;
      }
      return Math.trunc(ms);
    }
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
      return z.NEVER;
    }
  });

// ── File blocks ─────────────────────────────────────────────
// Every key may be absent or null (`key:` with nothing after it, or an
// env reference that expanded to nothing).

export const fileDiscordSchema = z.object({
  bot_token: scalarStringSchema.nullish(),
  application_id: scalarStringSchema.nullish(),
  webhooks: z.record(z.string(), scalarStringSchema.nullish()).nullish(),
});

export const fileRateLimitSchema = z.object({
  strategy: scalarStringSchema.nullish(),
  backoff_base: durationSchema.nullish(),
  backoff_max: durationSchema.nullish(),
});

export const fileClientSchema = z.object({
  timeout: durationSchema.nullish(),
  retries: integerSchema.nullish(),
  rate_limit: fileRateLimitSchema.nullish(),
  /** @deprecated superseded by `rate_limit.strategy`; migrated at load time */
  rate_limit_strategy: scalarStringSchema.nullish(),
});

export const fileLoggingSchema = z.object({
  level: scalarStringSchema.nullish(),
  format: scalarStringSchema.nullish(),
  output: scalarStringSchema.nullish(),
});

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  discord: fileDiscordSchema.nullish(),
  client: fileClientSchema.nullish(),
  logging: fileLoggingSchema.nullish(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Resolved config ─────────────────────────────────────────
// What commands see after loading and defaulting. Durations are milliseconds.

export interface DiscordConfig {
  botToken: string;
  applicationId: string;
  webhooks: Record<string, string>;
}

export interface RateLimitConfig {
  strategy: string;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface ClientConfig {
  timeoutMs: number;
  retries: number;
  rateLimit: RateLimitConfig;
}

export interface LoggingConfig {
  level: string;
  format: string;
  output: string;
}

export interface Config {
  discord: DiscordConfig;
  client: ClientConfig;
  logging: LoggingConfig;
}
