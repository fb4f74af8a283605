import type { AppContext } from '../context.js';
import { ServiceError, invalidArgument } from '../errors.js';
import { logEvent, recordMetric } from '../observability.js';
import { refreshRankingCache } from '../retrieval/rankingCache.js';
import type { IngestResult } from '../types.js';
import { countWords, normalize } from './normalizer.js';

/**
 * Stores a passage and propagates it downstream, in this order:
 *
 * 1. passage row (fatal on failure, nothing else runs)
 * 2. word counters, one atomic upsert per distinct word (fatal on failure)
 * 3. search index (logged and skipped on failure)
 * 4. ranking cache refresh (logged and skipped on failure)
 *
 * Writes already issued are never rolled back.
 */
export async function ingestPassage(ctx: AppContext, content: string): Promise<IngestResult> {
  if (!content.trim()) throw invalidArgument('passage content must not be empty');
  const started = Date.now();

  const created = await ctx.store.createPassage(content);
  if (!created.ok) {
    logEvent(ctx, { level: 'error', eventType: 'ingest_failed', event: { stage: 'persist', message: created.error.message } });
    throw new ServiceError('STORE_UNAVAILABLE', `Could not store passage: ${created.error.message}`, { cause: created.error });
  }
  const passage = created.value;
  logEvent(ctx, { passageId: passage.id, eventType: 'passage_stored', event: { length: content.length } });

  const words = normalize(content, { stopwords: ctx.config.stopwords, minLength: ctx.config.minWordLength });
  const counts = countWords(words);
  for (const [word, occurrences] of counts) {
    const incremented = await ctx.store.incrementWord(word, occurrences);
    if (!incremented.ok) {
      logEvent(ctx, {
        passageId: passage.id,
        level: 'error',
        eventType: 'ingest_failed',
        event: { stage: 'increment', word, message: incremented.error.message }
      });
      throw new ServiceError('STORE_UNAVAILABLE', `Could not update frequency of "${word}": ${incremented.error.message}`, {
        cause: incremented.error
      });
    }
  }

  const indexed = await ctx.index.indexDocument(passage);
  if (!indexed.ok) {
    logEvent(ctx, { passageId: passage.id, level: 'warn', eventType: 'index_failed', event: { message: indexed.error.message } });
  }

  const refreshed = await refreshRankingCache(ctx);
  if (!refreshed.ok) {
    logEvent(ctx, {
      passageId: passage.id,
      level: 'warn',
      eventType: 'ranking_cache_refresh_failed',
      event: { stage: refreshed.stage, message: refreshed.error.message }
    });
  }

  recordMetric(ctx, { metricName: 'ingest_duration_ms', metricValue: Date.now() - started, labels: { passageId: passage.id } });
  logEvent(ctx, {
    passageId: passage.id,
    eventType: 'passage_ingested',
    event: { words: words.length, distinctWords: counts.size, indexed: indexed.ok, cacheRefreshed: refreshed.ok }
  });

  return {
    passage,
    words: words.length,
    distinctWords: counts.size,
    indexed: indexed.ok,
    cacheRefreshed: refreshed.ok
  };
}

/** Pulls one passage from the text source and ingests it. */
export async function fetchAndIngest(ctx: AppContext): Promise<IngestResult> {
  const fetched = await ctx.textSource.fetchPassage();
  if (!fetched.ok || !fetched.value.trim()) {
    const message = fetched.ok ? 'text source returned no text' : fetched.error.message;
    logEvent(ctx, { level: 'error', eventType: 'text_source_failed', event: { message } });
    throw new ServiceError('SOURCE_UNAVAILABLE', `Could not fetch a passage: ${message}`, {
      cause: fetched.ok ? undefined : fetched.error
    });
  }
  return ingestPassage(ctx, fetched.value);
}
