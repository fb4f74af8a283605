import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { type AppConfig, loadConfig } from '../src/config.js';
import { type AppContext, type AppContextOverrides, createAppContext } from '../src/context.js';
import type { CacheStore } from '../src/cache/cacheStore.js';
import type { FrequencyStore } from '../src/db/frequencyStore.js';
import type { IndexHit, IndexQuery, IndexQueryResult, SearchIndex } from '../src/fulltext/searchIndex.js';
import type { DefinitionSource } from '../src/sources/definitionSource.js';
import type { TextSource } from '../src/sources/textSource.js';
import type { Passage, WordFrequency } from '../src/types.js';
import { type Result, fail, ok } from '../src/utils/result.js';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({
      WORDPULSE_DB_PATH: ':memory:',
      WORDPULSE_INDEX_DB_PATH: ':memory:',
      WORDPULSE_CACHE_DB_PATH: ':memory:'
    }),
    ...overrides
  };
}

export function testContext(overrides: AppContextOverrides = {}, config: Partial<AppConfig> = {}): AppContext {
  return createAppContext(testConfig(config), {
    definitions: new ScriptedDefinitions(),
    textSource: new FixedTextSource('The quick brown fox jumps'),
    ...overrides
  });
}

export async function seedWords(ctx: AppContext, counts: Record<string, number>): Promise<void> {
  for (const [word, count] of Object.entries(counts)) {
    const r = await ctx.store.incrementWord(word, count);
    if (!r.ok) throw r.error;
  }
}

/** Answers `definition of <word>` unless scripted otherwise; records every lookup. */
export class ScriptedDefinitions implements DefinitionSource {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, string | null | Error> = {}) {}

  async lookup(word: string): Promise<Result<string | null>> {
    this.calls.push(word);
    const scripted = this.script[word];
    if (scripted instanceof Error) return fail(scripted);
    if (scripted !== undefined) return ok(scripted);
    return ok(`definition of ${word}`);
  }
}

export class FixedTextSource implements TextSource {
  constructor(private readonly text: string | Error) {}

  async fetchPassage(): Promise<Result<string>> {
    return this.text instanceof Error ? fail(this.text) : ok(this.text);
  }
}

/** Cache whose every call fails, as with a refused connection. */
export class DownCache implements CacheStore {
  private readonly error = new Error('cache connection refused');
  async get(): Promise<Result<string | null>> {
    return fail(this.error);
  }
  async setWithTTL(): Promise<Result<void>> {
    return fail(this.error);
  }
  async delete(): Promise<Result<void>> {
    return fail(this.error);
  }
  async prune(): Promise<Result<number>> {
    return fail(this.error);
  }
  async ping(): Promise<Result<true>> {
    return fail(this.error);
  }
}

export class DownIndex implements SearchIndex {
  readonly queries: IndexQuery[] = [];
  private readonly error = new Error('index connection refused');
  async indexDocument(): Promise<Result<void>> {
    return fail(this.error);
  }
  async query(query: IndexQuery): Promise<Result<IndexQueryResult>> {
    this.queries.push(query);
    return fail(this.error);
  }
  async documentCount(): Promise<Result<number>> {
    return fail(this.error);
  }
  async ping(): Promise<Result<true>> {
    return fail(this.error);
  }
}

/** Returns a fixed ranked list regardless of the query. */
export class CannedIndex implements SearchIndex {
  readonly queries: IndexQuery[] = [];

  constructor(
    private readonly hits: IndexHit[],
    private readonly total: number = hits.length
  ) {}

  async indexDocument(): Promise<Result<void>> {
    return ok(undefined);
  }
  async query(query: IndexQuery): Promise<Result<IndexQueryResult>> {
    this.queries.push(query);
    return ok({ hits: this.hits, total: this.total });
  }
  async documentCount(): Promise<Result<number>> {
    return ok(this.hits.length);
  }
  async ping(): Promise<Result<true>> {
    return ok(true);
  }
}

type StoreMethod = keyof FrequencyStore;

/** Delegates to a real store; methods listed in `failing` return a failure instead. */
export class FlakyStore implements FrequencyStore {
  readonly failing = new Set<StoreMethod>();
  readonly calls: StoreMethod[] = [];

  constructor(private readonly inner: FrequencyStore) {}

  private guard<T>(method: StoreMethod, run: () => Promise<Result<T>>): Promise<Result<T>> {
    this.calls.push(method);
    if (this.failing.has(method)) return Promise.resolve(fail<T>(new Error(`store ${method} unavailable`)));
    return run();
  }

  createPassage(content: string): Promise<Result<Passage>> {
    return this.guard('createPassage', () => this.inner.createPassage(content));
  }
  incrementWord(word: string, by?: number): Promise<Result<number>> {
    return this.guard('incrementWord', () => this.inner.incrementWord(word, by));
  }
  topWords(limit: number): Promise<Result<WordFrequency[]>> {
    return this.guard('topWords', () => this.inner.topWords(limit));
  }
  wordCount(): Promise<Result<number>> {
    return this.guard('wordCount', () => this.inner.wordCount());
  }
  passageCount(): Promise<Result<number>> {
    return this.guard('passageCount', () => this.inner.passageCount());
  }
  ping(): Promise<Result<true>> {
    return this.guard('ping', () => this.inner.ping());
  }
}

/** Temporary directory holding a file that is not a SQLite database. */
export function unusableDbPath(name: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wordpulse-test-'));
  const file = path.join(dir, name);
  fs.writeFileSync(file, 'not a sqlite database '.repeat(200));
  return file;
}

export function passage(id: number, content = `passage ${id}`): Passage {
  return { id, content, createdAt: '2026-01-01T00:00:00.000Z' };
}
