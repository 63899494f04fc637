/**
 * Chat Command
 *
 * Interactive multi-turn REPL over RAGOrchestrator.handleTurn.
 *
 *   radv chat
 *   radv chat --thread kitchen
 *
 * REPL commands:
 *   /help            Show available commands
 *   /clear           Forget the current thread's history
 *   /thread [id]     Show or switch the current thread
 *   /summary         Show the running summary of the current thread
 *   /exit            Leave (also: exit, quit, Ctrl+C)
 *
 * Ctrl+C while an answer is pending cancels that turn; the question is
 * removed from the thread again.
 */

import { Command } from 'commander';
import * as readline from 'node:readline';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { renderTurn } from '../utils/turn-output.js';
import { loadConfig } from '../../config/loader.js';
import { runMigrations, getDatabase } from '../../database/index.js';
import { createEmbeddingProvider, createGenerator } from '../../providers/index.js';
import { createAdvisor, type Advisor } from '../../agent/index.js';
import { CLIError, TurnAbortedError } from '../../errors/index.js';
import { DEFAULT_THREAD_ID } from './ask.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  thread: string;
  model?: string;
}

/**
 * Mutable session state shared by the REPL and its commands.
 */
export interface ChatState {
  advisor: Advisor;
  threadId: string;
  providerInfo: { name: string; model: string };
  /** Cancels the pending turn, if any */
  pending?: AbortController;
}

interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  usage?: string;
  /** Returns false to end the session */
  handler: (args: string[], state: ChatState, ctx: CommandContext) => Promise<boolean>;
}

// ============================================================================
// REPL Commands
// ============================================================================

export const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: async (_args, _state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      ctx.log('');
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0 ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`) : '';
        const usageStr = cmd.usage ? ` ${chalk.cyan(cmd.usage)}` : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${usageStr}${aliasStr}`);
        ctx.log(`    ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Type any other text to ask a question.'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c', 'reset'],
    description: "Forget the current thread's history",
    handler: async (_args, state, ctx) => {
      state.advisor.conversations.reset(state.threadId);
      ctx.log(chalk.dim(`Thread "${state.threadId}" cleared.`));
      return true;
    },
  },
  {
    name: 'thread',
    aliases: ['t'],
    description: 'Show or switch the current thread',
    usage: '[id]',
    handler: async (args, state, ctx) => {
      const next = args[0];
      if (!next) {
        const snapshot = state.advisor.conversations.getThread(state.threadId);
        const count = snapshot ? snapshot.messages.length + snapshot.summarizedCount : 0;
        ctx.log(`Thread: ${chalk.cyan(state.threadId)} ${chalk.dim(`(${count} messages)`)}`);
        return true;
      }
      state.threadId = next;
      ctx.log(chalk.dim(`Switched to thread "${next}".`));
      return true;
    },
  },
  {
    name: 'summary',
    aliases: ['s'],
    description: 'Show the running summary of the current thread',
    handler: async (_args, state, ctx) => {
      const snapshot = state.advisor.conversations.getThread(state.threadId);
      if (!snapshot?.summary) {
        ctx.log(chalk.dim('No summary yet.'));
      } else {
        ctx.log(chalk.bold(`Summary (${snapshot.summarizedCount} earlier messages):`));
        ctx.log(snapshot.summary);
      }
      if (snapshot?.lastSummaryError) {
        ctx.log(chalk.yellow(`Last summarization failed: ${snapshot.lastSummaryError}`));
      }
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Leave the chat',
    handler: async (_args, _state, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse user input to detect REPL commands.
 * Returns null if it's a regular question.
 */
export function parseREPLCommand(input: string): { command: REPLCommand; args: string[] } | null {
  const trimmed = input.trim();

  const bare = /^(exit|quit)$/i.test(trimmed) ? 'exit' : null;
  if (!bare && !trimmed.startsWith('/')) {
    return null;
  }

  const parts = bare ? [bare] : trimmed.slice(1).split(/\s+/);
  const cmdName = parts[0]?.toLowerCase() ?? '';
  const command = REPL_COMMANDS.find((c) => c.name === cmdName || c.aliases.includes(cmdName));

  // Unknown commands are treated as questions
  return command ? { command, args: parts.slice(1) } : null;
}

function getPrompt(state: ChatState): string {
  return state.threadId === DEFAULT_THREAD_ID
    ? chalk.green('> ')
    : chalk.green(`[${state.threadId}]> `);
}

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  ctx.log('');
  ctx.log(chalk.bold('Review Advisor Chat'));
  ctx.log(chalk.dim(`Model: ${state.providerInfo.name}/${state.providerInfo.model}`));
  ctx.log('');
  if (state.advisor.indexedCount === 0) {
    ctx.log(chalk.yellow('No reviews indexed.'));
    ctx.log(chalk.dim('Run: radv ingest <reviews.csv>  for answers grounded in reviews.'));
  } else {
    ctx.log(chalk.dim(`${state.advisor.indexedCount.toLocaleString()} reviews indexed`));
  }
  ctx.log('');
  ctx.log(chalk.dim('Type /help for commands, "exit" to quit'));
  ctx.log('');
}

/**
 * Run one question through the orchestrator and print the answer.
 *
 * @internal Exported for testing purposes
 */
export async function handleQuestion(
  input: string,
  state: ChatState,
  ctx: CommandContext
): Promise<void> {
  const controller = new AbortController();
  state.pending = controller;
  const spinner = process.stdout.isTTY ? ora('Thinking...').start() : null;

  try {
    const result = await state.advisor.orchestrator.runTurn(state.threadId, input, {
      signal: controller.signal,
    });
    spinner?.stop();
    ctx.log('');
    renderTurn(ctx, result);
    ctx.log('');
  } catch (error) {
    spinner?.stop();
    if (error instanceof TurnAbortedError) {
      ctx.log(chalk.dim('Cancelled.'));
      return;
    }
    throw error;
  } finally {
    if (state.pending === controller) {
      state.pending = undefined;
    }
  }
}

/**
 * Feed lines to `handle` one at a time. A line typed while an answer is
 * pending waits for that turn to settle.
 *
 * @internal Exported for testing purposes
 */
export function createLineQueue(
  handle: (line: string) => Promise<void>,
  onError: (error: unknown) => void
): (line: string) => Promise<void> {
  let tail: Promise<void> = Promise.resolve();
  return (line) => {
    tail = tail.then(() => handle(line)).catch(onError);
    return tail;
  };
}

// ============================================================================
// REPL Loop
// ============================================================================

/**
 * Main REPL loop using readline's event-based interface.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: getPrompt(state),
    });

    let closed = false;

    const handleLine = async (line: string): Promise<void> => {
      if (closed) {
        return;
      }
      const input = line.trim();
      if (!input) {
        rl.prompt();
        return;
      }

      const replCmd = parseREPLCommand(input);
      if (replCmd) {
        const shouldContinue = await replCmd.command.handler(replCmd.args, state, ctx);
        if (!shouldContinue) {
          rl.close();
          return;
        }
        rl.setPrompt(getPrompt(state));
        rl.prompt();
        return;
      }

      try {
        await handleQuestion(input, state, ctx);
      } catch (error) {
        if (error instanceof CLIError) {
          ctx.error(error.message);
          if (error.hint) {
            ctx.log(chalk.dim(error.hint));
          }
        } else {
          ctx.error(`Failed to process question: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
      rl.prompt();
    };

    const enqueue = createLineQueue(handleLine, (error) => {
      ctx.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
      if (!closed) {
        rl.prompt();
      }
    });
    rl.on('line', (line) => {
      void enqueue(line);
    });

    // First Ctrl+C cancels a pending answer, otherwise it exits
    rl.on('SIGINT', () => {
      if (state.pending) {
        state.pending.abort();
        return;
      }
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', () => {
      closed = true;
      state.pending?.abort();
      resolve();
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive multi-turn product recommendations')
    .option('-t, --thread <id>', 'Conversation thread id', DEFAULT_THREAD_ID)
    .option('-m, --model <model>', 'Override the configured chat model')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();
      ctx.debug('Starting chat session...');

      runMigrations();
      const config = loadConfig();
      const embedder = await createEmbeddingProvider(config.embedding);
      const { generator, name, model } = await createGenerator(config, {
        model: cmdOptions.model,
        fallback: {
          onFallback: (from, to, reason) => ctx.debug(`LLM fallback: ${from} → ${to} (${reason})`),
        },
      });
      ctx.debug(`Using: ${name}/${model}`);

      const advisor = await createAdvisor(config, {
        logger: ctx,
        database: getDatabase(),
        embedder,
        generator,
      });

      await runChatREPL(
        { advisor, threadId: cmdOptions.thread, providerInfo: { name, model } },
        ctx
      );
    });
}
