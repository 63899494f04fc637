/**
 * Generator-backed Summarizer
 */

import { GenerationUnavailableError } from '../errors/index.js';
import type { ChatMessage, Generator } from '../providers/types.js';
import type { Message, SummarizeInput, Summarizer } from './types.js';

const SUMMARY_INSTRUCTIONS = `You condense conversations between a shopper and a product recommendation assistant.
Keep the products discussed, the shopper's needs and constraints, and any recommendations already made.
Write plain prose, no more than a short paragraph. Reply with the summary only.`;

const ROLE_LABELS: Record<Message['role'], string> = {
  user: 'User',
  assistant: 'Assistant',
  system: 'System',
};

/**
 * Render messages as a "Role: content" transcript.
 */
export function formatTranscript(messages: readonly Message[]): string {
  return messages.map((m) => `${ROLE_LABELS[m.role]}: ${m.content}`).join('\n');
}

export function buildSummaryPrompt(input: SummarizeInput): ChatMessage[] {
  const sections = [
    input.previousSummary ? `Summary so far:\n${input.previousSummary}` : undefined,
    `New messages:\n${formatTranscript(input.messages)}`,
    input.previousSummary
      ? 'Write an updated summary that merges both.'
      : 'Write a summary of these messages.',
  ].filter((section): section is string => section !== undefined);

  return [
    { role: 'system', content: SUMMARY_INSTRUCTIONS },
    { role: 'user', content: sections.join('\n\n') },
  ];
}

export interface GeneratorSummarizerOptions {
  /** Token cap per summary (conversation.summary_max_tokens) */
  maxTokens?: number;
}

/**
 * @example
 * ```typescript
 * const summarizer = createGeneratorSummarizer(generator, { maxTokens: 256 });
 * ```
 */
export function createGeneratorSummarizer(
  generator: Generator,
  options: GeneratorSummarizerOptions = {}
): Summarizer {
  return {
    async summarize(input, callOptions = {}) {
      const summary = await generator.complete(buildSummaryPrompt(input), {
        maxTokens: options.maxTokens,
        temperature: 0,
        signal: callOptions.signal,
      });
      const trimmed = summary.trim();
      if (trimmed === '') {
        throw new GenerationUnavailableError(`${generator.name} returned an empty summary`);
      }
      return trimmed;
    },
  };
}
