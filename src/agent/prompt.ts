/**
 * Turn Prompt
 *
 * Message layout sent to the Generator for one turn:
 * ```
 * [system instructions, ...conversation context, reviews block, user question]
 * ```
 * Retrieved reviews are wrapped in XML so the model can cite them by number.
 */

import type { Message } from '../conversation/types.js';
import type { ChatMessage } from '../providers/types.js';
import type { RetrievedPassage } from '../search/types.js';
import type { RetrievalStatus } from './types.js';

export const SYSTEM_PROMPT = `You are a product recommendation assistant. You answer shoppers' questions using customer reviews.

## Grounding
- Base recommendations on the customer reviews provided with each question
- Cite reviews using [1], [2], etc.
- If the reviews disagree, say so and summarize both sides
- Never invent reviews, ratings or product features

## Response Guidelines
- Be concise: name the product(s) you recommend and why
- Use the conversation so far to understand follow-up questions
- If no review covers the question, say so honestly`;

const NO_PASSAGES_NOTE =
  'No customer reviews matched this question. Say that the reviews do not cover it; ' +
  'any general advice you give must be clearly labelled as not coming from reviews.';

const UNAVAILABLE_NOTE =
  'Customer reviews could not be searched right now. Tell the user that this answer ' +
  'is not based on reviews, and keep it general.';

/**
 * Escape text for XML element content and attribute values.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * @example
 * ```typescript
 * formatReviewsBlock(passages);
 * // <reviews>
 * // <review id="1" product="Kettle" score="0.92">
 * // Boils fast
 * // </review>
 * // </reviews>
 * ```
 */
export function formatReviewsBlock(passages: readonly RetrievedPassage[]): string {
  const reviews = passages.map(
    (passage, i) =>
      `<review id="${i + 1}" product="${escapeXml(passage.document.productTitle)}" ` +
      `score="${passage.relevanceScore.toFixed(2)}">\n` +
      `${escapeXml(passage.document.reviewText)}\n</review>`
  );
  return ['<reviews>', ...reviews, '</reviews>'].join('\n');
}

export interface TurnPromptInput {
  /** Conversation context before this turn's user message */
  history: readonly Message[];
  passages: readonly RetrievedPassage[];
  retrievalStatus: RetrievalStatus;
  userText: string;
}

export function buildTurnPrompt(input: TurnPromptInput): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: SYSTEM_PROMPT }];

  for (const message of input.history) {
    messages.push({ role: message.role, content: message.content });
  }

  let reviews: string;
  if (input.retrievalStatus === 'unavailable') {
    reviews = UNAVAILABLE_NOTE;
  } else if (input.passages.length === 0) {
    reviews = NO_PASSAGES_NOTE;
  } else {
    reviews = formatReviewsBlock(input.passages);
  }
  messages.push({ role: 'system', content: `## Customer Reviews\n${reviews}` });

  messages.push({ role: 'user', content: input.userText });
  return messages;
}
