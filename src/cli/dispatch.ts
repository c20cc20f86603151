import { DEFAULT_WEBHOOK, resolveConfig } from '../config/index.js';
import type { Env } from '../config/index.js';
import { createFormatter } from '../output/index.js';
import type { Formatter } from '../output/index.js';
import type { Config } from '../schema/index.js';
import type { CommandHandler } from '../commands/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { CliOptions } from './options.js';

// ── Process boundary ────────────────────────────────────────

export interface CliIO {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd: string;
  env: Env;
}

export interface CliRuntime {
  config: Config;
  formatter: Formatter;
  logger: Logger;
  /** Config file in use, if any. */
  configPath?: string;
}

// ── Runtime resolution ──────────────────────────────────────

/**
 * Runs before every subcommand: resolve config, apply flag overrides,
 * build the formatter, and announce the config file on stderr.
 */
export async function prepareRuntime(
  options: CliOptions,
  io: CliIO,
): Promise<CliRuntime> {
  const resolved = await resolveConfig({
    configPath: options.config,
    cwd: io.cwd,
    env: io.env,
  });

  const config = applyOverrides(resolved.config, options);
  const formatter = createFormatter(options.output);
  // Diagnostics never share stdout with formatted output, whatever
  // `logging.output` says.
  const logger = createLogger(config.logging, io.stderr);

  logger.debug('configuration resolved', {
    source: resolved.path ?? 'environment',
    output: formatter.kind,
  });
  if (hasValue(options.token)) {
    logger.debug('bot token overridden from --token');
  }
  if (hasValue(options.webhook)) {
    logger.debug('default webhook overridden from --webhook');
  }

  if (resolved.path !== undefined) {
    io.stderr.write(`using config ${resolved.path}\n`);
    return { config, formatter, logger, configPath: resolved.path };
  }
  return { config, formatter, logger };
}

/** Flag values win over whatever the file or environment said. Empty flags are ignored. */
export function applyOverrides(
  config: Config,
  options: Pick<CliOptions, 'token' | 'webhook'>,
): Config {
  const discord = { ...config.discord, webhooks: { ...config.discord.webhooks } };
  if (hasValue(options.token)) {
    discord.botToken = options.token;
  }
  if (hasValue(options.webhook)) {
    discord.webhooks[DEFAULT_WEBHOOK] = options.webhook;
  }
  return { ...config, discord };
}

// ── Output ──────────────────────────────────────────────────

export function printResult(
  runtime: CliRuntime,
  handler: CommandHandler,
  io: Pick<CliIO, 'stdout'>,
): void {
  const value = handler.project(runtime.config);
  io.stdout.write(runtime.formatter.format(value) + '\n');
}

function hasValue(flag: string | undefined): flag is string {
  return flag !== undefined && flag !== '';
}
