import type { DBContext } from './db/client.js';
import { errorMessage } from './errors.js';
import type { FrequencyStore } from './db/frequencyStore.js';
import type { CacheStore } from './cache/cacheStore.js';
import type { SearchIndex } from './fulltext/searchIndex.js';
import type { Result } from './utils/result.js';

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Writes one row to event_logs. warn and error are mirrored to stderr; when the
 * insert itself fails the event goes to stderr only.
 */
export function logEvent(
  ctx: DBContext,
  params: { passageId?: number; level?: LogLevel; eventType: string; event?: Record<string, unknown> }
): void {
  const level = params.level || 'info';
  const eventJson = JSON.stringify(params.event || {});
  if (level !== 'info') {
    console.error(`[${level}] ${params.eventType}${params.passageId ? ` passage=${params.passageId}` : ''} ${eventJson}`);
  }
  try {
    ctx.db
      .prepare('INSERT INTO event_logs (passage_id, level, event_type, event_json) VALUES (?, ?, ?, ?)')
      .run(params.passageId || null, level, params.eventType, eventJson);
  } catch (error) {
    console.error(`[error] event_log_write_failed ${params.eventType}: ${errorMessage(error)}`);
  }
}

export function recordMetric(
  ctx: DBContext,
  params: { metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  try {
    ctx.db
      .prepare('INSERT INTO metrics (metric_name, metric_value, labels_json) VALUES (?, ?, ?)')
      .run(params.metricName, params.metricValue, JSON.stringify(params.labels || {}));
  } catch (error) {
    console.error(`[error] metric_write_failed ${params.metricName}: ${errorMessage(error)}`);
  }
}

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export interface HealthReport {
  status: HealthState;
  store: ComponentHealth;
  cache: ComponentHealth;
  index: ComponentHealth;
  passages: number | null;
  words: number | null;
  indexedDocuments: number | null;
}

async function probe(check: () => Promise<Result<true>>): Promise<ComponentHealth> {
  const started = Date.now();
  const result = await check();
  const latencyMs = Date.now() - started;
  return result.ok ? { ok: true, latencyMs } : { ok: false, latencyMs, error: result.error.message };
}

async function valueOrNull(pending: Promise<Result<number>>): Promise<number | null> {
  const result = await pending;
  return result.ok ? result.value : null;
}

export async function healthStatus(ctx: {
  store: FrequencyStore;
  cache: CacheStore;
  index: SearchIndex;
}): Promise<HealthReport> {
  const [store, cache, index] = await Promise.all([
    probe(() => ctx.store.ping()),
    probe(() => ctx.cache.ping()),
    probe(() => ctx.index.ping())
  ]);

  const status: HealthState = !store.ok ? 'unhealthy' : cache.ok && index.ok ? 'healthy' : 'degraded';

  return {
    status,
    store,
    cache,
    index,
    passages: await valueOrNull(ctx.store.passageCount()),
    words: await valueOrNull(ctx.store.wordCount()),
    indexedDocuments: await valueOrNull(ctx.index.documentCount())
  };
}
