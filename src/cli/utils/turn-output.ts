/**
 * Turn Output
 *
 * Terminal and JSON rendering of a TurnResult, shared by `radv ask` and
 * `radv chat`.
 */

import chalk from 'chalk';
import type { TurnResult } from '../../agent/index.js';
import { formatScore, formatPassagesJSON, type FormattedPassageJSON } from '../../search/index.js';
import type { RetrievedPassage } from '../../search/index.js';
import type { CommandContext } from '../types.js';

/**
 * JSON shape of one answered turn.
 */
export interface TurnOutputJSON {
  threadId: string;
  question: string;
  answer: string;
  generated: boolean;
  retrievalStatus: TurnResult['retrievalStatus'];
  sources: FormattedPassageJSON[];
  metadata: {
    retrievalMs: number;
    generationMs: number;
    totalMs: number;
    summarization: TurnResult['summarization'];
  };
}

/**
 * Compact numbered source list matching the [n] citations in answers.
 *
 * @example
 * ```
 * [1] Blender (0.92)
 * [2] Kettle (0.81)
 * ```
 */
export function formatSources(passages: readonly RetrievedPassage[]): string {
  return passages
    .map((p, i) => `[${i + 1}] ${p.document.productTitle} ${chalk.dim(`(${formatScore(p.relevanceScore)})`)}`)
    .join('\n');
}

export function toTurnJSON(question: string, result: TurnResult): TurnOutputJSON {
  return {
    threadId: result.threadId,
    question,
    answer: result.response,
    generated: result.generated,
    retrievalStatus: result.retrievalStatus,
    sources: formatPassagesJSON(result.passages),
    metadata: {
      retrievalMs: result.timing.retrievalMs,
      generationMs: result.timing.generationMs,
      totalMs: result.timing.totalMs,
      summarization: result.summarization,
    },
  };
}

/**
 * Print the answer, its sources and (with --verbose) timings.
 */
export function renderTurn(ctx: CommandContext, result: TurnResult): void {
  ctx.log(result.generated ? result.response : chalk.yellow(result.response));

  if (result.retrievalStatus === 'unavailable') {
    ctx.log('');
    ctx.log(chalk.yellow('Reviews could not be searched; this answer is not based on them.'));
  } else if (result.passages.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    ctx.log(formatSources(result.passages));
  }

  if (ctx.options.verbose) {
    ctx.log('');
    ctx.log(chalk.dim('─'.repeat(50)));
    ctx.log(chalk.dim(`Retrieval: ${result.timing.retrievalMs.toFixed(0)}ms`));
    ctx.log(chalk.dim(`Generation: ${result.timing.generationMs.toFixed(0)}ms`));
    ctx.log(chalk.dim(`Total: ${result.timing.totalMs.toFixed(0)}ms`));
    if (result.summarization !== 'not_needed') {
      ctx.log(chalk.dim(`Summarization: ${result.summarization}`));
    }
  }
}
