/**
 * CLI module — argument parsing and dispatch.
 * Parses flags, resolves the runtime, hands off to a command handler.
 */

export { runCli, createProgram, CLI_VERSION } from './program.js';
export { prepareRuntime, applyOverrides, printResult } from './dispatch.js';
export type { CliIO, CliRuntime } from './dispatch.js';
export { parseCliOptions, cliOptionsSchema, DEFAULT_OUTPUT } from './options.js';
export type { CliOptions } from './options.js';
