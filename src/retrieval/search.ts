import type { AppContext } from '../context.js';
import { SEARCH_FUZZINESS, SEARCH_PAGE_SIZE } from '../config.js';
import { ServiceError, invalidArgument } from '../errors.js';
import { logEvent } from '../observability.js';
import type { SearchOperator, SearchResult } from '../types.js';

export const SEARCH_OPERATORS: readonly SearchOperator[] = ['AND', 'OR'];

/** Accepts `and`/`or` in any case. */
export function parseOperator(value: unknown): SearchOperator {
  const upper = typeof value === 'string' ? value.trim().toUpperCase() : '';
  const operator = SEARCH_OPERATORS.find((op) => op === upper);
  if (!operator) throw invalidArgument(`operator must be one of: and, or (got ${JSON.stringify(value)})`);
  return operator;
}

export function cleanWords(words: readonly string[]): string[] {
  return words.map((w) => w.trim()).filter(Boolean);
}

/**
 * Passages matching every word (AND) or any word (OR), each word fuzzy up to
 * two edits. Index order is kept as returned; at most SEARCH_PAGE_SIZE come
 * back, `total` is the index's match count.
 */
export async function searchPassages(ctx: AppContext, words: readonly string[], operator: unknown): Promise<SearchResult> {
  const op = parseOperator(operator);
  const clauses = cleanWords(words);
  if (clauses.length === 0) throw invalidArgument('words must contain at least one non-blank word');

  const result = await ctx.index.query({ clauses, operator: op, fuzziness: SEARCH_FUZZINESS, size: SEARCH_PAGE_SIZE });
  if (!result.ok) {
    logEvent(ctx, { level: 'error', eventType: 'search_failed', event: { clauses, operator: op, message: result.error.message } });
    throw new ServiceError('INDEX_UNAVAILABLE', `Search index unavailable: ${result.error.message}`, { cause: result.error });
  }

  return {
    passages: result.value.hits.slice(0, SEARCH_PAGE_SIZE).map((h) => h.passage),
    total: result.value.total
  };
}
