import { z } from 'zod';

// ── Global flags ────────────────────────────────────────────
// Built from commander's parsed option bag; handed to the dispatcher as a
// plain value.

export const DEFAULT_OUTPUT = 'json';

export const cliOptionsSchema = z.object({
  config: z.string().optional(),
  token: z.string().optional(),
  webhook: z.string().optional(),
  output: z.string().default(DEFAULT_OUTPUT),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
  return cliOptionsSchema.parse(raw);
}
