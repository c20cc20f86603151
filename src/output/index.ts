/**
 * Output module.
 * Deterministic rendering of command results as JSON, YAML or a table.
 */

export {
  createFormatter,
  isOutputFormat,
  formatJSON,
  formatYAML,
  formatTable,
  OUTPUT_FORMATS,
} from './formatter.js';
export type { Formatter, OutputFormat, DisplayValue } from './formatter.js';
