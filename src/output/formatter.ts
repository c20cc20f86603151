import { stringify as stringifyYaml } from 'yaml';

import { CliError } from '../errors/index.js';

// ── Types ────────────────────────────────────────────────────

/** What a command hands to the formatter: a flat record of scalars. */
export type DisplayValue = Readonly<Record<string, string | number>>;

export const OUTPUT_FORMATS = ['json', 'table', 'yaml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface Formatter {
  readonly kind: OutputFormat;
  /** Rendered text without a trailing newline. */
  format(value: DisplayValue): string;
}

// ── Factory ──────────────────────────────────────────────────

export function isOutputFormat(kind: string): kind is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === kind);
}

/** Case-insensitive. Throws a `FORMATTER` CliError for anything else. */
export function createFormatter(kind: string): Formatter {
  const normalized = kind.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new CliError({
      kind: 'FORMATTER',
      message: `unsupported output format "${kind}" (expected ${OUTPUT_FORMATS.join(', ')})`,
    });
  }

  switch (normalized) {
    case 'json':
      return { kind: 'json', format: formatJSON };
    case 'table':
      return { kind: 'table', format: formatTable };
    case 'yaml':
      return { kind: 'yaml', format: formatYAML };
  }
}

// ── JSON ─────────────────────────────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function formatJSON(value: DisplayValue): string {
  return JSON.stringify(value, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => compareKeys(a, b)),
  );
}

// ── YAML ─────────────────────────────────────────────────────

export function formatYAML(value: DisplayValue): string {
  return stringifyYaml(value, { sortMapEntries: true }).replace(/\n$/, '');
}

// ── Table ────────────────────────────────────────────────────
// Two columns, key column padded to the longest key plus two spaces.

const COLUMN_GAP = 2;

export function formatTable(value: DisplayValue): string {
  const rows = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
  const width = rows.reduce((max, [key]) => Math.max(max, key.length), 0);
  return rows
    .map(([key, cell]) => `${key.padEnd(width + COLUMN_GAP)}${String(cell)}`)
    .join('\n');
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
