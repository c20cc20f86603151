/**
 * Error types surfaced to the CLI.
 * Everything that aborts a command is a CliError; the entry point prints
 * the message and exits non-zero.
 */

export type CliErrorKind = 'CONFIG_READ' | 'CONFIG_PARSE' | 'FORMATTER';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly path?: string;

  constructor(params: {
    kind: CliErrorKind;
    message: string;
    path?: string;
    cause?: unknown;
  }) {
    super(
      params.message,
      params.cause !== undefined ? { cause: params.cause } : undefined,
    );
    this.name = 'CliError';
    this.kind = params.kind;
    if (params.path !== undefined) {
      this.path = params.path;
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
