/**
 * Passage Formatter
 *
 * Formats retrieved passages for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * const text = formatPassages(passages);
 * // [0.92] Kettle
 * //   Boils fast and the auto-off works every time...
 * ```
 */

import type { RetrievedPassage } from './types.js';

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

const SNIPPET_INDENT = '  ';

export interface FormatOptions {
  /** Maximum snippet length (default: 200) */
  snippetLength?: number;
  /** Show the similarity score (default: true) */
  showScore?: boolean;
}

export interface FormattedPassageJSON {
  id: string;
  score: number;
  productTitle: string;
  reviewText: string;
  metadata: Record<string, string>;
}

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength`, adding "..." when cut.
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * Format one passage as a header line plus an indented snippet.
 */
export function formatPassage(passage: RetrievedPassage, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const header = showScore
    ? `[${formatScore(passage.relevanceScore)}] ${passage.document.productTitle}`
    : passage.document.productTitle;

  return `${header}\n${SNIPPET_INDENT}${truncateSnippet(passage.document.reviewText, snippetLength)}`;
}

/**
 * Format passages separated by blank lines. Empty input gives ''.
 */
export function formatPassages(passages: RetrievedPassage[], options: FormatOptions = {}): string {
  return passages.map((passage) => formatPassage(passage, options)).join('\n\n');
}

/**
 * JSON-serializable passages for `--json` output.
 */
export function formatPassagesJSON(passages: RetrievedPassage[]): FormattedPassageJSON[] {
  return passages.map((passage) => ({
    id: passage.document.id,
    score: passage.relevanceScore,
    productTitle: passage.document.productTitle,
    reviewText: passage.document.reviewText,
    metadata: { ...passage.document.sourceMetadata },
  }));
}
