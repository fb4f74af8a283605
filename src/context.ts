import { type AppConfig, loadConfig } from './config.js';
import { type DBContext, initDB, lazyConnect } from './db/client.js';
import { runMigrations } from './db/migrations.js';
import { type FrequencyStore, createFrequencyStore } from './db/frequencyStore.js';
import { type CacheStore, createCacheStore } from './cache/cacheStore.js';
import { type SearchIndex, createSearchIndex } from './fulltext/searchIndex.js';
import { type TextSource, createHttpTextSource } from './sources/textSource.js';
import { type DefinitionSource, createHttpDefinitionSource } from './sources/definitionSource.js';

/**
 * Everything an operation needs: the durable db (for logs) plus one adapter per
 * external system. The durable db opens here; cache and index connect on first use.
 */
export interface AppContext extends DBContext {
  config: AppConfig;
  store: FrequencyStore;
  cache: CacheStore;
  index: SearchIndex;
  textSource: TextSource;
  definitions: DefinitionSource;
}

export type AppContextOverrides = Partial<Omit<AppContext, 'config'>>;

export function createAppContext(config: AppConfig = loadConfig(), overrides: AppContextOverrides = {}): AppContext {
  let db = overrides.db;
  if (db) {
    runMigrations(db);
  } else {
    db = initDB(config.dbPath).db;
  }

  return {
    config,
    db,
    store: overrides.store ?? createFrequencyStore({ db }),
    cache: overrides.cache ?? createCacheStore(lazyConnect(config.cacheDbPath)),
    index: overrides.index ?? createSearchIndex(lazyConnect(config.indexDbPath)),
    textSource: overrides.textSource ?? createHttpTextSource(config.textSourceUrl, config.httpTimeoutMs),
    definitions: overrides.definitions ?? createHttpDefinitionSource(config.dictionaryApiUrl, config.httpTimeoutMs)
  };
}
