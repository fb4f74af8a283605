import { z } from 'zod';
import type { AppContext } from '../context.js';
import { ServiceError } from '../errors.js';
import { logEvent } from '../observability.js';
import type { WordFrequency } from '../types.js';
import { type Result, type StageOutcome, hit, miss, stageError } from '../utils/result.js';

export const RANKING_CACHE_KEY = 'ranking:top';

const rankingEntrySchema = z.object({
  /** row limit the snapshot was read with */
  limit: z.number().int().positive(),
  words: z.array(z.object({ word: z.string().min(1), count: z.number().int().positive() }))
});

export type RankingCacheEntry = z.infer<typeof rankingEntrySchema>;

/** An entry answers `n` when it was read with a limit of at least `n`, or holds every word there was. */
export function coversLimit(entry: RankingCacheEntry, n: number): boolean {
  return entry.limit >= n || entry.words.length < entry.limit;
}

export async function readRankingCache(ctx: Pick<AppContext, 'cache'>): Promise<StageOutcome<RankingCacheEntry>> {
  const cached = await ctx.cache.get(RANKING_CACHE_KEY);
  if (!cached.ok) return stageError(cached.error);
  if (cached.value === null) return miss();
  try {
    const parsed = rankingEntrySchema.safeParse(JSON.parse(cached.value));
    return parsed.success ? hit(parsed.data) : stageError(new Error('Malformed ranking cache entry'));
  } catch (error) {
    return stageError(error instanceof Error ? error : new Error(String(error)));
  }
}

export function writeRankingCache(ctx: Pick<AppContext, 'cache' | 'config'>, words: WordFrequency[], limit: number): Promise<Result<void>> {
  const entry: RankingCacheEntry = { limit, words };
  return ctx.cache.setWithTTL(RANKING_CACHE_KEY, JSON.stringify(entry), ctx.config.rankingCacheTtlSeconds);
}

export type RefreshOutcome = { ok: true; rows: number } | { ok: false; stage: 'store' | 'cache'; error: Error };

/**
 * Replaces the ranking snapshot with the current top `rankingCacheSize` rows.
 * An empty store clears the key instead of caching an empty ranking.
 */
export async function refreshRankingCache(ctx: AppContext): Promise<RefreshOutcome> {
  const limit = ctx.config.rankingCacheSize;
  const top = await ctx.store.topWords(limit);
  if (!top.ok) return { ok: false, stage: 'store', error: top.error };

  const written = top.value.length > 0 ? await writeRankingCache(ctx, top.value, limit) : await ctx.cache.delete(RANKING_CACHE_KEY);
  if (!written.ok) return { ok: false, stage: 'cache', error: written.error };
  return { ok: true, rows: top.value.length };
}

/**
 * Drops expired cache entries, then repopulates the ranking cache from the
 * store; returns the rows cached.
 */
export async function warmRankingCache(ctx: AppContext): Promise<number> {
  const pruned = await ctx.cache.prune();
  if (pruned.ok) {
    logEvent(ctx, { eventType: 'cache_pruned', event: { removed: pruned.value } });
  } else {
    logEvent(ctx, { level: 'warn', eventType: 'cache_prune_failed', event: { message: pruned.error.message } });
  }

  const outcome = await refreshRankingCache(ctx);
  if (outcome.ok) {
    logEvent(ctx, { eventType: 'ranking_cache_warmed', event: { rows: outcome.rows } });
    return outcome.rows;
  }
  if (outcome.stage === 'store') {
    throw new ServiceError('STORE_UNAVAILABLE', `Frequency store unavailable: ${outcome.error.message}`, { cause: outcome.error });
  }
  logEvent(ctx, { level: 'warn', eventType: 'ranking_cache_warm_failed', event: { message: outcome.error.message } });
  return 0;
}
