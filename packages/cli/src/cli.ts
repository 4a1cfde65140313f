/**
 * CLI entry point using Commander.js
 */

import * as path from 'node:path';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import {
  capturePrintOutput,
  errorMessage,
  printError,
  type CommandName,
  type DispatchOptions,
} from '@devcell/core';
import {
  disposeContainer,
  getContainer,
  initializeContainer,
  type ServiceOverrides,
} from './services/ServiceContainer.js';
import { getShortVersion } from './version.js';

/**
 * Options commander collects for a command, global ones included
 */
const CommandOptionsSchema = z.object({
  debug: z.boolean().optional(),
  config: z.string().optional(),
  rebuild: z.boolean().optional(),
  cleanImages: z.boolean().optional(),
});

export interface RunContext {
  /** Project directory, defaults to process.cwd() */
  cwd?: string;
  services?: ServiceOverrides;
  /** Commander's own output (help, usage errors) */
  writeOut?: (str: string) => void;
  writeErr?: (str: string) => void;
}

/**
 * Build the program. Every run gets a fresh instance so option values never
 * carry over between runs.
 * @param onExit Receives the dispatcher's exit code
 */
export function createProgram(context: RunContext, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('devcell')
    .description('Bootstrap a containerized development environment')
    .version(getShortVersion())
    .option('--debug', 'Log debug output')
    .option('--config <path>', 'Configuration file (default: ./.devcell.env)')
    .exitOverride() // Throw instead of process.exit() - enables testing
    .configureOutput({
      writeOut: context.writeOut ?? ((str) => process.stdout.write(str)),
      writeErr: context.writeErr ?? ((str) => process.stderr.write(str)),
    });

  const dispatch = async (name: CommandName, command: Command, extra: DispatchOptions = {}): Promise<void> => {
    const options = CommandOptionsSchema.parse(command.optsWithGlobals());
    const projectDir = context.cwd ?? process.cwd();

    initializeContainer({
      projectDir,
      configFile: options.config ? path.resolve(projectDir, options.config) : undefined,
      debug: options.debug,
      overrides: context.services,
    });

    try {
      onExit(
        await getContainer().dispatcher.dispatch(name, {
          rebuild: options.rebuild,
          cleanImages: options.cleanImages,
          ...extra,
        })
      );
    } finally {
      disposeContainer();
    }
  };

  program
    .command('start', { isDefault: true })
    .description('Build if needed and start the container (default)')
    .argument('[args...]', 'Command run inside the container, after --')
    .option('--rebuild', 'Rebuild the image even if it exists')
    .action(async (args: string[], _options: unknown, command: Command) => {
      await dispatch('start', command, { args });
    });

  program
    .command('shell')
    .description('Open an interactive shell in the container')
    .option('--rebuild', 'Rebuild the image even if it exists')
    .action(async (_options: unknown, command: Command) => {
      await dispatch('shell', command);
    });

  program
    .command('build')
    .description('Build the container image')
    .action(async (_options: unknown, command: Command) => {
      await dispatch('build', command);
    });

  program
    .command('clean')
    .description('Stop the container')
    .option('--clean-images', 'Also remove the container image')
    .action(async (_options: unknown, command: Command) => {
      await dispatch('clean', command);
    });

  program
    .command('config')
    .description('Write a configuration template')
    .action(async (_options: unknown, command: Command) => {
      await dispatch('config', command);
    });

  program
    .command('validate')
    .description('Check the host without starting anything')
    .action(async (_options: unknown, command: Command) => {
      await dispatch('validate', command);
    });

  return program;
}

/**
 * Parse arguments and run one command.
 * @param args Arguments after the executable name
 * @returns Process exit code
 */
export async function run(args: string[] = process.argv.slice(2), context: RunContext = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: 'user' });
    return exitCode;
  } catch (err: unknown) {
    // Commander throws on exitOverride - it has already printed the message
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    printError(`ERROR: ${errorMessage(err)}`);
    return 1;
  } finally {
    disposeContainer();
  }
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run CLI command programmatically (for testing).
 * Captures output and returns result instead of writing to the terminal.
 */
export async function runCommand(args: string[], context: RunContext = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const restore = capturePrintOutput(
    (s) => stdout.push(s),
    (s) => stderr.push(s)
  );

  try {
    const exitCode = await run(args, {
      ...context,
      services: {
        logFile: null,
        colour: false,
        ...context.services,
        writeConsole: (line) => stderr.push(line),
      },
      writeOut: (str) => stdout.push(str),
      writeErr: (str) => stderr.push(str),
    });
    return { stdout: stdout.join(''), stderr: stderr.join(''), exitCode };
  } finally {
    restore();
  }
}
