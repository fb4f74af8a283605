import type { AppContext } from '../context.js';
import { ServiceError, invalidArgument } from '../errors.js';
import { logEvent, recordMetric } from '../observability.js';
import type { WordDefinition, WordFrequency } from '../types.js';
import { type Stage, hit, miss, runChain, stageError } from '../utils/result.js';
import { coversLimit, readRankingCache, writeRankingCache } from './rankingCache.js';

export const DEFINITION_PLACEHOLDER = 'Definition not found';

export const definitionCacheKey = (word: string): string => `definition:${word}`;

interface RankingRequest {
  ctx: AppContext;
  n: number;
}

interface DefinitionRequest {
  ctx: AppContext;
  word: string;
}

const rankingStages: Array<Stage<RankingRequest, WordFrequency[]>> = [
  {
    name: 'ranking_cache',
    async run({ ctx, n }) {
      const outcome = await readRankingCache(ctx);
      if (outcome.kind !== 'hit') return outcome.kind === 'miss' ? miss() : stageError(outcome.error);
      return coversLimit(outcome.value, n) ? hit(outcome.value.words.slice(0, n)) : miss();
    }
  },
  {
    name: 'frequency_store',
    async run({ ctx, n }) {
      const limit = Math.max(n, ctx.config.rankingCacheSize);
      const top = await ctx.store.topWords(limit);
      if (!top.ok) return stageError(top.error);
      if (top.value.length > 0) {
        const written = await writeRankingCache(ctx, top.value, limit);
        if (!written.ok) {
          logEvent(ctx, { level: 'warn', eventType: 'ranking_cache_write_failed', event: { message: written.error.message } });
        }
      }
      return hit(top.value.slice(0, n));
    }
  }
];

const definitionStages: Array<Stage<DefinitionRequest, string>> = [
  {
    name: 'definition_cache',
    async run({ ctx, word }) {
      const cached = await ctx.cache.get(definitionCacheKey(word));
      if (!cached.ok) return stageError(cached.error);
      return cached.value ? hit(cached.value) : miss();
    }
  },
  {
    name: 'definition_source',
    async run({ ctx, word }) {
      const found = await ctx.definitions.lookup(word);
      if (!found.ok) return stageError(found.error);
      if (found.value === null) return miss();
      const written = await ctx.cache.setWithTTL(definitionCacheKey(word), found.value, ctx.config.definitionCacheTtlSeconds);
      if (!written.ok) {
        logEvent(ctx, { level: 'warn', eventType: 'definition_cache_write_failed', event: { word, message: written.error.message } });
      }
      return hit(found.value);
    }
  }
];

async function resolveDefinition(ctx: AppContext, entry: WordFrequency): Promise<WordDefinition> {
  const resolved = await runChain(definitionStages, { ctx, word: entry.word });
  for (const { stage, error } of resolved.errors) {
    logEvent(ctx, {
      level: 'warn',
      eventType: stage === 'definition_cache' ? 'definition_cache_unavailable' : 'definition_lookup_failed',
      event: { word: entry.word, message: error.message }
    });
  }
  recordMetric(ctx, {
    metricName: resolved.stage === 'definition_cache' ? 'definition_cache_hit' : 'definition_cache_miss',
    metricValue: 1,
    labels: { word: entry.word }
  });
  return { word: entry.word, definition: resolved.value ?? DEFINITION_PLACEHOLDER, frequency: entry.count };
}

/**
 * Top `n` words by frequency with a definition each.
 *
 * Ranking: ranking cache, then the frequency store. Definitions: definition
 * cache, then the definition source, then a placeholder. Only a store failure
 * or an empty store fails the call.
 */
export async function topDefinitions(ctx: AppContext, n: number = ctx.config.defaultTopN): Promise<WordDefinition[]> {
  if (!Number.isInteger(n) || n < 1 || n > ctx.config.maxTopN) {
    throw invalidArgument(`n must be an integer between 1 and ${ctx.config.maxTopN}`);
  }

  const ranking = await runChain(rankingStages, { ctx, n });
  for (const { stage, error } of ranking.errors) {
    if (stage === 'ranking_cache') {
      logEvent(ctx, { level: 'warn', eventType: 'ranking_cache_unavailable', event: { message: error.message } });
    }
  }
  recordMetric(ctx, { metricName: ranking.stage === 'ranking_cache' ? 'ranking_cache_hit' : 'ranking_cache_miss', metricValue: 1 });

  if (ranking.value === null) {
    const storeError = ranking.errors.find((e) => e.stage === 'frequency_store')?.error;
    logEvent(ctx, { level: 'error', eventType: 'dictionary_failed', event: { message: storeError?.message } });
    throw new ServiceError('STORE_UNAVAILABLE', `Frequency store unavailable: ${storeError?.message ?? 'no ranking source'}`, {
      cause: storeError
    });
  }
  if (ranking.value.length === 0) {
    throw new ServiceError('NOT_FOUND', 'No words have been ingested yet');
  }

  return Promise.all(ranking.value.slice(0, n).map((entry) => resolveDefinition(ctx, entry)));
}
