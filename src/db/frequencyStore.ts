import type { DBContext, SqliteDatabase } from './client.js';
import type { Passage, WordFrequency } from '../types.js';
import { type Result, settle } from '../utils/result.js';

/**
 * System of record: passages and the global word counter table.
 */
export interface FrequencyStore {
  createPassage(content: string): Promise<Result<Passage>>;
  /** Atomic upsert; returns the count after the increment. */
  incrementWord(word: string, by?: number): Promise<Result<number>>;
  /** Count descending, word ascending on ties. */
  topWords(limit: number): Promise<Result<WordFrequency[]>>;
  wordCount(): Promise<Result<number>>;
  passageCount(): Promise<Result<number>>;
  ping(): Promise<Result<true>>;
}

interface PassageRow {
  id: number;
  content: string;
  created_at: string;
}

function count(db: SqliteDatabase, sql: string): number {
  return Number(db.prepare<[], { c: number }>(sql).get()?.c ?? 0);
}

export function createFrequencyStore(ctx: DBContext): FrequencyStore {
  const { db } = ctx;

  return {
    createPassage(content) {
      return settle(() => {
        const row = db
          .prepare<[string], PassageRow>('INSERT INTO passages (content) VALUES (?) RETURNING id, content, created_at')
          .get(content);
        if (!row) throw new Error('passage insert returned no row');
        return { id: row.id, content: row.content, createdAt: row.created_at };
      });
    },

    incrementWord(word, by = 1) {
      return settle(() => {
        if (!Number.isInteger(by) || by < 1) throw new RangeError(`increment must be a positive integer, got ${by}`);
        const row = db
          .prepare<[string, number], { frequency: number }>(
            `INSERT INTO word_frequencies (word, frequency) VALUES (?, ?)
             ON CONFLICT(word) DO UPDATE SET frequency = frequency + excluded.frequency, updated_at = CURRENT_TIMESTAMP
             RETURNING frequency`
          )
          .get(word, by);
        if (!row) throw new Error(`increment of "${word}" returned no row`);
        return row.frequency;
      });
    },

    topWords(limit) {
      return settle(() =>
        db
          .prepare<[number], { word: string; frequency: number }>(
            'SELECT word, frequency FROM word_frequencies ORDER BY frequency DESC, word ASC LIMIT ?'
          )
          .all(limit)
          .map((r) => ({ word: r.word, count: r.frequency }))
      );
    },

    wordCount() {
      return settle(() => count(db, 'SELECT COUNT(*) AS c FROM word_frequencies'));
    },

    passageCount() {
      return settle(() => count(db, 'SELECT COUNT(*) AS c FROM passages'));
    },

    ping() {
      return settle(() => {
        db.prepare('SELECT 1').get();
        return true as const;
      });
    }
  };
}
