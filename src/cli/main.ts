#!/usr/bin/env node

/**
 * discord CLI entry point.
 * Thin wrapper — all logic lives in program.ts and below.
 */

import 'dotenv/config';

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
  env: process.env,
});
