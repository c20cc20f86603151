/**
 * Configuration module.
 * Resolves runtime config from a YAML file or the environment and fills
 * in defaults. CLI flag overrides are applied by the dispatcher.
 */

export {
  CLIENT_DEFAULTS,
  LOGGING_DEFAULTS,
  ENV_VARS,
  DEFAULT_WEBHOOK,
  CONFIG_SEARCH_PATHS,
} from './defaults.js';
export { parseDuration } from './duration.js';
export { defaultConfig, expandEnv, envOrDefault } from './env.js';
export type { Env } from './env.js';
export { loadConfigFile, parseConfig, applyDefaults } from './loader.js';
export { resolveConfig } from './resolve.js';
export type { ResolvedConfig, ResolveOptions } from './resolve.js';
