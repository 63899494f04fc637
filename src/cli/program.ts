/**
 * Review Advisor CLI Program
 *
 * Sets up Commander.js with global options and registers all subcommands.
 * Kept apart from the entry point so tests can build a program without
 * parsing process.argv.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { CLIError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';
import { safeJsonParse } from '../utils/json.js';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json (two levels up from both src/cli and dist/cli).
 */
export function readVersion(): string {
  let text: string | undefined;
  try {
    text = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
  return safeJsonParse(text, PackageJsonSchema, { version: '0.0.0' }).version;
}

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('radv')
    .description('Product recommendations grounded in customer reviews')
    .version(readVersion(), '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)

    .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('radv ingest reviews.csv')}             Build the review index
  ${chalk.cyan('radv ask "Which blender is quiet?"')}  Ask one question
  ${chalk.cyan('radv chat')}                           Start a conversation
  ${chalk.cyan('radv search "sturdy kettle"')}         Show matching reviews only
  ${chalk.cyan('radv config set retrieval.top_k 5')}   Change a setting
`);

  /**
   * Global options are parsed onto the root command
   */
  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
    };
  };
  const getContext = () => createContext(getGlobalOptions());

  program.addCommand(createIngestCommand(getContext));
  program.addCommand(createSearchCommand(getContext));
  program.addCommand(createAskCommand(getContext));
  program.addCommand(createChatCommand(getContext));
  program.addCommand(createStatusCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  program.on('command:*', (operands: string[]) => {
    throw new CLIError(
      `Unknown command: ${operands[0] ?? ''}`,
      'Run: radv --help  to see available commands'
    );
  });

  // Validate provider settings before commands that call a provider
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const validationOptions = getValidationOptionsForCommand(actionCommand.name());
    if (validationOptions.skipLLM && validationOptions.skipEmbedding) {
      return;
    }

    const opts = getGlobalOptions();
    const result = validateStartupConfig(validationOptions);

    if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
      printStartupValidation(result, opts.verbose);

      if (result.errors.length > 0) {
        throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
      }
    }
  });

  return program;
}
