/**
 * Agent Module
 *
 * The conversational boundary: one call per user turn.
 *
 * @example
 * ```typescript
 * import { createAdvisor } from './agent/index.js';
 *
 * const { orchestrator } = await createAdvisor(config);
 * const answer = await orchestrator.handleTurn('thread-1', 'Best kettle under $50?');
 * ```
 */

export type {
  OrchestratorOptions,
  RetrievalStatus,
  TurnOptions,
  TurnResult,
  TurnTiming,
} from './types.js';

export {
  RAGOrchestrator,
  FALLBACK_RESPONSE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from './orchestrator.js';

export {
  SYSTEM_PROMPT,
  buildTurnPrompt,
  escapeXml,
  formatReviewsBlock,
  type TurnPromptInput,
} from './prompt.js';

export { createAdvisor, type Advisor, type AdvisorOptions } from './factory.js';
