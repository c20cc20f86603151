import { Command, CommanderError } from 'commander';

import { COMMANDS } from '../commands/index.js';
import type { CommandHandler } from '../commands/index.js';
import { errorMessage } from '../errors/index.js';
import { prepareRuntime, printResult } from './dispatch.js';
import type { CliIO } from './dispatch.js';
import { DEFAULT_OUTPUT, parseCliOptions } from './options.js';

export const CLI_VERSION = '0.1.0';

// ── Program ─────────────────────────────────────────────────

export function createProgram(io: CliIO): Command {
  const program = new Command();

  // Output and exit settings must be in place before subcommands are
  // added; commander copies them at creation.
  program
    .name('discord')
    .description('Discord SDK CLI')
    .version(CLI_VERSION)
    .option('--config <path>', 'path to Discord config (YAML)')
    .option('--token <string>', 'override bot token')
    .option('--webhook <string>', 'override default webhook URL')
    .option('--output <format>', 'output format (json/table/yaml)', DEFAULT_OUTPUT)
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .exitOverride();

  for (const handler of COMMANDS) {
    registerCommand(program, handler, io);
  }

  return program;
}

function registerCommand(
  program: Command,
  handler: CommandHandler,
  io: CliIO,
): void {
  program
    .command(handler.name)
    .description(handler.description)
    .action(async (_opts: unknown, command: Command) => {
      const options = parseCliOptions(command.optsWithGlobals());
      const runtime = await prepareRuntime(options, io);
      printResult(runtime, handler, io);
    });
}

// ── Entry ───────────────────────────────────────────────────

/**
 * Parse `argv` (without the node and script entries), run the selected
 * subcommand and return the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    // Commander has already written its own message (usage, help, version).
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 1;
    }
    io.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
}
