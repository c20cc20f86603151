import { stat } from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_SEARCH_PATHS } from './defaults.js';
import { defaultConfig } from './env.js';
import type { Env } from './env.js';
import { loadConfigFile } from './loader.js';
import type { Config } from '../schema/index.js';
import { CliError, errorMessage } from '../errors/index.js';

export interface ResolvedConfig {
  config: Config;
  /** Path of the file the config came from; absent when built from the environment. */
  path?: string;
}

export interface ResolveOptions {
  /** Explicit `--config` path. Empty means not given. */
  configPath?: string;
  cwd?: string;
  env?: Env;
  searchPaths?: readonly string[];
}

/**
 * Pick the configuration source: the explicit path if given, else the first
 * search path that exists, else the environment.
 */
export async function resolveConfig(options: ResolveOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath !== undefined && options.configPath !== '') {
    const configPath = options.configPath;
    try {
      const config = await loadConfigFile(path.resolve(cwd, configPath), env);
      return { config, path: configPath };
    } catch (err) {
      throw new CliError({
        kind: err instanceof CliError ? err.kind : 'CONFIG_READ',
        message: `failed to load config ${configPath}: ${errorMessage(err)}`,
        path: configPath,
        cause: err,
      });
    }
  }

  for (const candidate of options.searchPaths ?? CONFIG_SEARCH_PATHS) {
    const absolute = path.resolve(cwd, candidate);
    if (!(await exists(absolute))) continue;
    const config = await loadConfigFile(absolute, env);
    return { config, path: candidate };
  }

  return { config: defaultConfig(env) };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}
