import { readFile } from 'node:fs/promises';

import { isMap, isScalar, parseDocument } from 'yaml';
import type { Document } from 'yaml';
import type { ZodError } from 'zod';

import { CLIENT_DEFAULTS, ENV_VARS, LOGGING_DEFAULTS } from './defaults.js';
import { envOrDefault, expandEnv } from './env.js';
import type { Env } from './env.js';
import { fileConfigSchema } from '../schema/config.js';
import type { Config, FileConfig, RateLimitConfig } from '../schema/config.js';
import { CliError, errorMessage } from '../errors/index.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load a YAML config file, expanding `${VAR}` / `$VAR` references from
 * `env` before parsing, then fill every unset field with its default.
 *
 * Throws a CliError of kind `CONFIG_READ` when the file cannot be read and
 * `CONFIG_PARSE` when the YAML or its values are malformed.
 */
export async function loadConfigFile(
  configPath: string,
  env: Env = process.env,
): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new CliError({
      kind: 'CONFIG_READ',
      message: `failed to read config file: ${errorMessage(err)}`,
      path: configPath,
      cause: err,
    });
  }

  return parseConfig(expandEnv(raw, env), env, configPath);
}

/** Parse already-expanded YAML text. Exported for callers that hold the text. */
export function parseConfig(
  text: string,
  env: Env = process.env,
  configPath?: string,
): Config {
  const document = parseDocument(text, { intAsBigInt: true, keepSourceTokens: true });
  const yamlError = document.errors[0];
  if (yamlError !== undefined) {
    throw parseError(yamlError.message, configPath, yamlError);
  }
  keepLiteralText(document);

  const result = fileConfigSchema.safeParse(document.toJS() ?? {});
  if (!result.success) {
    throw parseError(describeIssue(result.error), configPath, result.error);
  }

  return applyDefaults(result.data, env);
}

// ── Literal scalars ─────────────────────────────────────────
// Tokens, IDs and URLs keep the text as written: `1.50` stays `1.50`, not
// the number 1.5 stringified.

const LITERAL_PATHS: readonly (readonly string[])[] = [
  ['discord', 'bot_token'],
  ['discord', 'application_id'],
  ['client', 'rate_limit', 'strategy'],
  ['client', 'rate_limit_strategy'],
  ['logging', 'level'],
  ['logging', 'format'],
  ['logging', 'output'],
];

function keepLiteralText(document: Document.Parsed): void {
  for (const path of LITERAL_PATHS) {
    useSourceText(document.getIn(path, true));
  }
  const webhooks = document.getIn(['discord', 'webhooks'], true);
  if (isMap(webhooks)) {
    for (const pair of webhooks.items) {
      useSourceText(pair.value);
    }
  }
}

function useSourceText(node: unknown): void {
  if (!isScalar(node)) return;
  if (node.value === null || typeof node.value === 'string') return;
  if (node.source !== undefined) {
    node.value = node.source;
  }
}

// ── Defaults ────────────────────────────────────────────────

type FileDiscord = NonNullable<FileConfig['discord']>;
type FileClient = NonNullable<FileConfig['client']>;
type FileRateLimit = NonNullable<FileClient['rate_limit']>;
type FileLogging = NonNullable<FileConfig['logging']>;

export function applyDefaults(file: FileConfig, env: Env = process.env): Config {
  const discord: FileDiscord = file.discord ?? {};
  const client: FileClient = file.client ?? {};
  const logging: FileLogging = file.logging ?? {};

  const webhooks: Record<string, string> = {};
  for (const [label, url] of Object.entries(discord.webhooks ?? {})) {
    webhooks[label] = url ?? '';
  }

  return {
    discord: {
      botToken: discord.bot_token ?? '',
      applicationId: discord.application_id ?? '',
      webhooks,
    },
    client: {
      timeoutMs: client.timeout || CLIENT_DEFAULTS.TIMEOUT_MS,
      retries: client.retries || CLIENT_DEFAULTS.RETRIES,
      rateLimit: resolveRateLimit(client, env),
    },
    logging: {
      level: logging.level || LOGGING_DEFAULTS.LEVEL,
      format: logging.format || LOGGING_DEFAULTS.FORMAT,
      output: logging.output ?? '',
    },
  };
}

/**
 * Strategy precedence: structured `rate_limit.strategy`, then the
 * deprecated flat `rate_limit_strategy`, then the environment, then
 * `adaptive`. The flat field does not survive past this point.
 */
function resolveRateLimit(client: FileClient, env: Env): RateLimitConfig {
  const block: FileRateLimit = client.rate_limit ?? {};
  const strategy =
    block.strategy ||
    client.rate_limit_strategy ||
    envOrDefault(env, ENV_VARS.RATE_LIMIT_STRATEGY, CLIENT_DEFAULTS.RATE_LIMIT_STRATEGY);

  return {
    strategy,
    backoffBaseMs: block.backoff_base || CLIENT_DEFAULTS.BACKOFF_BASE_MS,
    backoffMaxMs: block.backoff_max || CLIENT_DEFAULTS.BACKOFF_MAX_MS,
  };
}

// ── Errors ──────────────────────────────────────────────────

function parseError(
  detail: string,
  configPath: string | undefined,
  cause: unknown,
): CliError {
  return new CliError({
    kind: 'CONFIG_PARSE',
    message: `failed to parse config file: ${detail}`,
    ...(configPath !== undefined ? { path: configPath } : {}),
    cause,
  });
}

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) return error.message;
  return issue.path.length > 0
    ? `${issue.path.join('.')}: ${issue.message}`
    : issue.message;
}
