/**
 * Ask Command
 *
 * One question, one turn:
 *
 *   radv ask "Which blender is the quietest?"
 *   radv ask "Is it easy to clean?" --thread kitchen   # follow-up in a named thread
 *   radv ask "Best kettle?" --json
 *
 * Threads live in memory, so --thread only matters for programmatic use
 * and for parity with `radv chat`; each invocation starts fresh.
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { renderTurn, toTurnJSON } from '../utils/turn-output.js';
import { loadConfig } from '../../config/loader.js';
import { runMigrations, getDatabase } from '../../database/index.js';
import { createEmbeddingProvider, createGenerator } from '../../providers/index.js';
import { createAdvisor } from '../../agent/index.js';
import { CLIError } from '../../errors/index.js';

interface AskCommandOptions {
  thread: string;
  model?: string;
}

export const DEFAULT_THREAD_ID = 'default';

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the reviewed products')
    .description('Ask a question answered from customer reviews')
    .option('-t, --thread <id>', 'Conversation thread id', DEFAULT_THREAD_ID)
    .option('-m, --model <model>', 'Override the configured chat model')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError(
          'Question cannot be empty',
          'Ask about a product, e.g.: radv ask "Which kettle boils fastest?"'
        );
      }

      // ─────────────────────────────────────────────────────────────────────
      // 1. Wire collaborators
      // ─────────────────────────────────────────────────────────────────────
      runMigrations();
      const config = loadConfig();
      const embedder = await createEmbeddingProvider(config.embedding);
      const { generator, name, model, usedFallback } = await createGenerator(config, {
        model: cmdOptions.model,
        fallback: {
          onFallback: (from, to, reason) => ctx.debug(`LLM fallback: ${from} → ${to} (${reason})`),
        },
      });
      if (usedFallback) {
        ctx.warn(`Using fallback provider ${name}/${model}`);
      }
      ctx.debug(`Using: ${name}/${model}`);

      const advisor = await createAdvisor(config, {
        logger: ctx,
        database: getDatabase(),
        embedder,
        generator,
      });

      // ─────────────────────────────────────────────────────────────────────
      // 2. Run the turn
      // ─────────────────────────────────────────────────────────────────────
      const spinner = !ctx.options.json && process.stdout.isTTY ? ora('Thinking...').start() : null;
      const result = await advisor.orchestrator
        .runTurn(cmdOptions.thread, trimmedQuestion)
        .finally(() => spinner?.stop());

      // ─────────────────────────────────────────────────────────────────────
      // 3. Output
      // ─────────────────────────────────────────────────────────────────────
      if (ctx.options.json) {
        console.log(JSON.stringify(toTurnJSON(trimmedQuestion, result), null, 2));
        return;
      }

      renderTurn(ctx, result);
      if (ctx.options.verbose) {
        ctx.log(chalk.dim(`Model: ${name}/${model}`));
      }
      if (!result.generated) {
        process.exitCode = 1;
      }
    });
}
