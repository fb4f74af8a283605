import type { IngestResult } from '../types.js';

export function buildIngestionSummary(result: IngestResult): string {
  const preview = result.passage.content.replace(/\s+/g, ' ').trim().slice(0, 280);
  return [
    `✅ Ingested passage #${result.passage.id}`,
    `Words counted: ${result.words} (${result.distinctWords} distinct)`,
    `Indexed: ${result.indexed ? 'yes' : 'no (see event_logs)'}`,
    `Ranking cache: ${result.cacheRefreshed ? 'refreshed' : 'stale until TTL'}`,
    preview ? `Preview: ${preview}${preview.length >= 280 ? '…' : ''}` : null
  ]
    .filter(Boolean)
    .join('\n');
}
