/**
 * Response Validator
 *
 * Normalizes completion text and rejects content that cannot be a query.
 */

import { DOMAIN_DEFINITIONS, GENERIC_TABLES } from '../../config/domains.js';
import { DOMAINS } from '../../core/types.js';

/** Fewer non-whitespace characters than this is not a query */
export const MIN_QUERY_CHARS = 5;

/** Characters a query cannot start with */
const INVALID_START_CHARS = new Set(['.', '|', ',', ';', ')', '}', ']', '=']);

const REFUSAL_PATTERN = /\b(sorry|apologi[sz]e|apologies|unable|cannot|can't|can’t)\b/i;

const BARE_TABLE_NAMES = new Set(
  [...GENERIC_TABLES, ...DOMAINS.flatMap((domain) => DOMAIN_DEFINITIONS[domain].tables)].map(
    (table) => table.toLowerCase()
  )
);

export type ValidationResult =
  | { valid: true; query: string }
  | { valid: false; reason: 'empty' | 'invalid-start' | 'refusal' | 'bare-table'; message: string };

/**
 * Strip surrounding code fences, collapse runs of 3+ blank lines to 2 and
 * trim trailing whitespace on every line. Idempotent.
 */
export function normalizeCompletion(content: string): string {
  let text = content.replace(/\r\n/g, '\n').trim();

  // Opening fence with a language tag only when a newline follows it,
  // otherwise bare backticks
  text = text.replace(/^```[A-Za-z0-9_-]*[ \t]*\n|^`+/, '');
  text = text.replace(/\n?```\s*$|`+$/, '');

  return text
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''))
    .join('\n')
    .replace(/\n{4,}/g, '\n\n\n')
    .trim();
}

function nonWhitespaceLength(text: string): number {
  return text.replace(/\s/g, '').length;
}

/**
 * Normalize and check a completion.
 *
 * Rejected when:
 * - fewer than 5 non-whitespace characters
 * - the first character cannot start a query
 * - it contains a refusal / apology word
 * - it is nothing but a table name
 */
export function validateCompletion(content: string | null): ValidationResult {
  const query = content === null ? '' : normalizeCompletion(content);

  if (nonWhitespaceLength(query) < MIN_QUERY_CHARS) {
    return { valid: false, reason: 'empty', message: 'Empty or invalid response from model' };
  }

  const first = query.charAt(0);
  if (INVALID_START_CHARS.has(first)) {
    return {
      valid: false,
      reason: 'invalid-start',
      message: `Invalid KQL query starting with '${first}'`,
    };
  }

  const refusal = REFUSAL_PATTERN.exec(query);
  if (refusal) {
    return {
      valid: false,
      reason: 'refusal',
      message: `Model returned a refusal ('${refusal[1]}'): ${query.slice(0, 120)}`,
    };
  }

  if (BARE_TABLE_NAMES.has(query.replace(/;$/, '').trim().toLowerCase())) {
    return {
      valid: false,
      reason: 'bare-table',
      message: `Model returned only a table name: ${query}`,
    };
  }

  return { valid: true, query };
}
