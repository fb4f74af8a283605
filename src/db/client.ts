import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { runMigrations } from './migrations.js';
import { errorMessage } from '../errors.js';

export type SqliteDatabase = Database.Database;

export interface DBContext {
  db: SqliteDatabase;
}

const BUSY_TIMEOUT_MS = 5000;

/** Opens a SQLite file, creating its directory first. `:memory:` is passed through. */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath, { timeout: BUSY_TIMEOUT_MS });
  if (dbPath !== ':memory:') {
    try {
      db.pragma('journal_mode = WAL');
    } catch (error) {
      // WAL is unavailable on some filesystems; the default rollback journal still works.
      console.warn(`journal_mode=WAL not applied to ${dbPath}: ${errorMessage(error)}`);
    }
  }
  return db;
}

export type Connect = () => SqliteDatabase;

/** Defers opening until the first call and keeps the handle from then on. A failed open is retried. */
export function lazyConnect(dbPath: string): Connect {
  let db: SqliteDatabase | null = null;
  return () => {
    if (!db) db = openDatabase(dbPath);
    return db;
  };
}

/** Runs `setup` once per handle, before the handle is first used. */
export function withSetup(connect: Connect, setup: (db: SqliteDatabase) => void): Connect {
  let prepared: SqliteDatabase | null = null;
  return () => {
    const db = connect();
    if (db !== prepared) {
      setup(db);
      prepared = db;
    }
    return db;
  };
}

export function initDB(dbPath = path.resolve(process.cwd(), 'data', 'wordpulse.sqlite')): DBContext {
  const db = openDatabase(dbPath);
  runMigrations(db);
  return { db };
}
