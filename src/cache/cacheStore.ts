import { type Connect, type SqliteDatabase, withSetup } from '../db/client.js';
import { type Result, settle } from '../utils/result.js';

/**
 * Key/value cache with per-key TTL. Callers treat any failed Result as a miss.
 */
export interface CacheStore {
  get(key: string): Promise<Result<string | null>>;
  setWithTTL(key: string, value: string, ttlSeconds: number): Promise<Result<void>>;
  delete(key: string): Promise<Result<void>>;
  /** Drops every expired entry; returns how many were removed. */
  prune(): Promise<Result<number>>;
  ping(): Promise<Result<true>>;
}

export interface CacheStoreOptions {
  now?: () => number;
}

function ensureCacheSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS cache_entries (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      expires_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cache_entries_expires_at ON cache_entries(expires_at);
  `);
}

/**
 * Cache kept in its own SQLite database. The connection is opened on the first
 * call, so an unusable file surfaces as a failed Result rather than at startup.
 */
export function createCacheStore(connect: Connect, options: CacheStoreOptions = {}): CacheStore {
  const now = options.now ?? Date.now;
  const database = withSetup(connect, ensureCacheSchema);

  return {
    get(key) {
      return settle(() => {
        const db = database();
        const at = now();
        const row = db
          .prepare<[string], { value: string; expires_at: number }>('SELECT value, expires_at FROM cache_entries WHERE key = ?')
          .get(key);
        if (!row) return null;
        if (row.expires_at <= at) {
          db.prepare('DELETE FROM cache_entries WHERE key = ? AND expires_at <= ?').run(key, at);
          return null;
        }
        return row.value;
      });
    },

    setWithTTL(key, value, ttlSeconds) {
      return settle(() => {
        if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) throw new RangeError(`ttl must be positive, got ${ttlSeconds}`);
        database()
          .prepare(
            `INSERT INTO cache_entries (key, value, expires_at) VALUES (?, ?, ?)
             ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`
          )
          .run(key, value, now() + Math.round(ttlSeconds * 1000));
      });
    },

    delete(key) {
      return settle(() => {
        database().prepare('DELETE FROM cache_entries WHERE key = ?').run(key);
      });
    },

    prune() {
      return settle(() => database().prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(now()).changes);
    },

    ping() {
      return settle(() => {
        database().prepare('SELECT 1').get();
        return true as const;
      });
    }
  };
}
