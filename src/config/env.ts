import { CLIENT_DEFAULTS, DEFAULT_WEBHOOK, ENV_VARS, LOGGING_DEFAULTS } from './defaults.js';
import type { Config } from '../schema/index.js';

export type Env = Readonly<Record<string, string | undefined>>;

/** Empty counts as unset. */
export function envOrDefault(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

// ── Interpolation ───────────────────────────────────────────
// Shell-style rules: `${NAME}` takes everything up to `}`; `$NAME` takes a
// run of letters, digits and underscores; `$` followed by one of
// `*#$@!?-` or a digit names that single character (so `$$` and `$1` read
// variables that are normally unset). `${}` is dropped, an unclosed `${`
// loses the `$` and `{`, and any other `$` is kept.

const SPECIAL_NAMES = '*#$@!?-0123456789';
const NAME_CHAR = /[A-Za-z0-9_]/;

/** Replace variable references in `text`; unset names become empty. */
export function expandEnv(text: string, env: Env): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const c = text.charAt(i);
    if (c !== '$' || i + 1 >= text.length) {
      out += c;
      i++;
      continue;
    }
    const [name, width] = readName(text, i + 1);
    if (name !== '') {
      out += env[name] ?? '';
    } else if (width === 0) {
      out += '$';
    }
    i += 1 + width;
  }
  return out;
}

/** Name after a `$` at `start`, and how many characters it spans. */
function readName(text: string, start: number): [string, number] {
  const first = text.charAt(start);
  if (first === '{') {
    const second = text.charAt(start + 1);
    if (second !== '' && SPECIAL_NAMES.includes(second) && text.charAt(start + 2) === '}') {
      return [second, 3];
    }
    const close = text.indexOf('}', start + 1);
    if (close === -1) return ['', 1];
    if (close === start + 1) return ['', 2];
    return [text.slice(start + 1, close), close - start + 1];
  }
  if (SPECIAL_NAMES.includes(first)) {
    return [first, 1];
  }
  let end = start;
  while (end < text.length && NAME_CHAR.test(text.charAt(end))) {
    end++;
  }
  return [text.slice(start, end), end - start];
}

// ── Environment-only config ─────────────────────────────────

/** Configuration used when no config file is found. Never fails. */
export function defaultConfig(env: Env = process.env): Config {
  return {
    discord: {
      botToken: env[ENV_VARS.BOT_TOKEN] ?? '',
      applicationId: env[ENV_VARS.APPLICATION_ID] ?? '',
      webhooks: {
        [DEFAULT_WEBHOOK]: env[ENV_VARS.WEBHOOK] ?? '',
      },
    },
    client: {
      timeoutMs: CLIENT_DEFAULTS.TIMEOUT_MS,
      retries: CLIENT_DEFAULTS.RETRIES,
      rateLimit: {
        strategy: envOrDefault(
          env,
          ENV_VARS.RATE_LIMIT_STRATEGY,
          CLIENT_DEFAULTS.RATE_LIMIT_STRATEGY,
        ),
        backoffBaseMs: CLIENT_DEFAULTS.BACKOFF_BASE_MS,
        backoffMaxMs: CLIENT_DEFAULTS.BACKOFF_MAX_MS,
      },
    },
    logging: {
      level: envOrDefault(env, ENV_VARS.LOG_LEVEL, LOGGING_DEFAULTS.LEVEL),
      format: LOGGING_DEFAULTS.FORMAT,
      output: LOGGING_DEFAULTS.OUTPUT,
    },
  };
}
