/**
 * Duration strings as written in config files: `30s`, `1m30s`, `250ms`,
 * `1.5h`, `-5s`, or a bare `0`. Values are returned as whole milliseconds,
 * truncated toward zero.
 */

const UNIT_NANOS: Readonly<Record<string, number>> = {
  ns: 1,
  us: 1_000,
  'µs': 1_000,
  'μs': 1_000,
  ms: 1_000_000,
  s: 1_000_000_000,
  m: 60_000_000_000,
  h: 3_600_000_000_000,
};

// Longer units first so `ms` is not read as `m` followed by garbage.
const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === '0') return 0;
  if (input.length === 0) {
    throw new Error('empty duration');
  }
  const negative = input.startsWith('-');
  let nanos = 0;
  let offset = negative || input.startsWith('+') ? 1 : 0;
  if (offset === input.length) {
    throw new Error(`invalid duration "${text}"`);
  }

  while (offset < input.length) {
    SEGMENT.lastIndex = offset;
    const match = SEGMENT.exec(input);
    const amount = match?.[1];
    const unit = match?.[2];
    if (amount === undefined || unit === undefined) {
      throw new Error(`invalid duration "${text}"`);
    }
    const factor = UNIT_NANOS[unit];
    if (factor === undefined) {
      throw new Error(`unknown unit "${unit}" in duration "${text}"`);
    }
    nanos += Math.round(Number(amount) * factor);
    offset += amount.length + unit.length;
  }

  return Math.trunc((negative ? -nanos : nanos) / 1_000_000);
}
