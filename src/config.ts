import { DEFAULT_STOPWORDS } from './ingest/normalizer.js';

export interface AppConfig {
  dbPath: string;
  indexDbPath: string;
  cacheDbPath: string;
  textSourceUrl: string;
  dictionaryApiUrl: string;
  rankingCacheTtlSeconds: number;
  definitionCacheTtlSeconds: number;
  /** rows kept in the ranking cache entry */
  rankingCacheSize: number;
  defaultTopN: number;
  maxTopN: number;
  minWordLength: number;
  stopwords: ReadonlySet<string>;
  httpTimeoutMs: number;
}

export const SEARCH_PAGE_SIZE = 10;
export const SEARCH_FUZZINESS = 2;

type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value ?? fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function stopwordList(value: string | undefined): ReadonlySet<string> {
  const configured = value?.trim();
  if (!configured) return DEFAULT_STOPWORDS;
  return new Set(
    configured
      .split(',')
      .map((w) => w.trim().toLowerCase())
      .filter(Boolean)
  );
}

export function loadConfig(env: Env = process.env): AppConfig {
  const defaultTopN = positiveInt(env.WORDPULSE_DEFAULT_TOP_N, 10);
  return {
    dbPath: env.WORDPULSE_DB_PATH || 'data/wordpulse.sqlite',
    indexDbPath: env.WORDPULSE_INDEX_DB_PATH || 'data/index.sqlite',
    cacheDbPath: env.WORDPULSE_CACHE_DB_PATH || 'data/cache.sqlite',
    textSourceUrl: env.WORDPULSE_TEXT_SOURCE_URL || 'http://metaphorpsum.com/paragraphs/1/50',
    dictionaryApiUrl: (env.WORDPULSE_DICTIONARY_API_URL || 'https://api.dictionaryapi.dev/api/v2/entries/en').replace(/\/+$/, ''),
    rankingCacheTtlSeconds: positiveInt(env.WORDPULSE_RANKING_CACHE_TTL_SECONDS, 3600),
    definitionCacheTtlSeconds: positiveInt(env.WORDPULSE_DEFINITION_CACHE_TTL_SECONDS, 86400),
    rankingCacheSize: positiveInt(env.WORDPULSE_RANKING_CACHE_SIZE, 10),
    defaultTopN,
    maxTopN: Math.max(defaultTopN, positiveInt(env.WORDPULSE_MAX_TOP_N, 100)),
    minWordLength: positiveInt(env.WORDPULSE_MIN_WORD_LENGTH, 4),
    stopwords: stopwordList(env.WORDPULSE_STOPWORDS),
    httpTimeoutMs: positiveInt(env.WORDPULSE_HTTP_TIMEOUT_MS, 10000)
  };
}
