import type { Config } from '../schema/index.js';
import type { DisplayValue } from '../output/index.js';

/**
 * A subcommand is a read-only projection of the resolved config.
 * The CLI layer formats whatever `project` returns and prints it.
 */
export interface CommandHandler {
  readonly name: string;
  readonly description: string;
  project(config: Config): DisplayValue;
}
