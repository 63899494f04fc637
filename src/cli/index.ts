#!/usr/bin/env node
/**
 * Review Advisor CLI Entry Point
 *
 * Main entry point for the `radv` command.
 */

import { createProgram } from './program.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

async function main(): Promise<void> {
  const program = createProgram();

  // --verbose/--json are known once parsing has started
  const getErrorOptions = () => {
    const opts = program.opts<{ verbose?: boolean; json?: boolean }>();
    return { verbose: opts.verbose ?? false, json: opts.json ?? false };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

main().catch((error: unknown) => handleError(error));
