import { type Connect, type SqliteDatabase, withSetup } from '../db/client.js';
import { countWords, tokenize } from '../ingest/normalizer.js';
import type { Passage, SearchOperator } from '../types.js';
import { boundedEditDistance } from '../utils/editDistance.js';
import { type Result, settle } from '../utils/result.js';

export interface IndexQuery {
  /** one entry per clause; a clause matches when any of its tokens matches */
  clauses: string[];
  operator: SearchOperator;
  /** maximum edit distance between a clause token and an indexed term */
  fuzziness: number;
  size: number;
}

export interface IndexHit {
  passage: Passage;
  score: number;
}

export interface IndexQueryResult {
  /** score descending, passage id ascending on ties */
  hits: IndexHit[];
  total: number;
}

export interface SearchIndex {
  indexDocument(passage: Passage): Promise<Result<void>>;
  query(query: IndexQuery): Promise<Result<IndexQueryResult>>;
  documentCount(): Promise<Result<number>>;
  ping(): Promise<Result<true>>;
}

interface DocumentRow {
  id: number;
  content: string;
  created_at: string;
  length: number;
}

interface TermExpansion {
  term: string;
  df: number;
  weight: number;
}

function idf(docCount: number, df: number): number {
  return Math.log((docCount + 1) / (df + 1)) + 1;
}

function ensureIndexSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS documents (
      id INTEGER PRIMARY KEY,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL,
      length INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS postings (
      term TEXT NOT NULL,
      doc_id INTEGER NOT NULL,
      tf INTEGER NOT NULL,
      PRIMARY KEY (term, doc_id)
    );
    CREATE INDEX IF NOT EXISTS idx_postings_doc_id ON postings(doc_id);
  `);
}

function countDocuments(db: SqliteDatabase): number {
  return Number(db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM documents').get()?.c ?? 0);
}

function writeDocument(db: SqliteDatabase, passage: Passage): void {
  const tokens = tokenize(passage.content);
  const insertPosting = db.prepare('INSERT INTO postings (term, doc_id, tf) VALUES (?, ?, ?)');
  db.transaction(() => {
    db.prepare('DELETE FROM postings WHERE doc_id = ?').run(passage.id);
    db.prepare(
      `INSERT INTO documents (id, content, created_at, length) VALUES (?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET content = excluded.content, created_at = excluded.created_at, length = excluded.length`
    ).run(passage.id, passage.content, passage.createdAt, tokens.length);
    for (const [term, tf] of countWords(tokens)) {
      insertPosting.run(term, passage.id, tf);
    }
  })();
}

function expand(token: string, vocabulary: Array<{ term: string; df: number }>, fuzziness: number): TermExpansion[] {
  const expansions: TermExpansion[] = [];
  for (const { term, df } of vocabulary) {
    const distance = boundedEditDistance(token, term, fuzziness);
    if (distance <= fuzziness) expansions.push({ term, df, weight: 1 / (1 + distance) });
  }
  return expansions;
}

function runQuery(db: SqliteDatabase, query: IndexQuery): IndexQueryResult {
  if (query.clauses.length === 0) throw new Error('query needs at least one clause');

  const docCount = countDocuments(db);
  if (docCount === 0) return { hits: [], total: 0 };

  const vocabulary = db.prepare<[], { term: string; df: number }>('SELECT term, COUNT(*) AS df FROM postings GROUP BY term').all();
  const selectPostings = db.prepare<[string], { doc_id: number; tf: number }>('SELECT doc_id, tf FROM postings WHERE term = ?');

  const clauseScores = query.clauses.map((clause) => {
    const scores = new Map<number, number>();
    for (const token of tokenize(clause)) {
      for (const expansion of expand(token, vocabulary, query.fuzziness)) {
        const termIdf = idf(docCount, expansion.df);
        for (const p of selectPostings.all(expansion.term)) {
          scores.set(p.doc_id, (scores.get(p.doc_id) ?? 0) + p.tf * termIdf * expansion.weight);
        }
      }
    }
    return scores;
  });

  const combined = new Map<number, number>();
  if (query.operator === 'AND') {
    const [first, ...rest] = clauseScores;
    for (const [docId, score] of first) {
      let total = score;
      let matchesAll = true;
      for (const other of rest) {
        const s = other.get(docId);
        if (s === undefined) {
          matchesAll = false;
          break;
        }
        total += s;
      }
      if (matchesAll) combined.set(docId, total);
    }
  } else {
    for (const scores of clauseScores) {
      for (const [docId, score] of scores) combined.set(docId, (combined.get(docId) ?? 0) + score);
    }
  }

  if (combined.size === 0) return { hits: [], total: 0 };

  const selectDocument = db.prepare<[number], DocumentRow>('SELECT id, content, created_at, length FROM documents WHERE id = ?');
  const ranked: Array<{ row: DocumentRow; score: number }> = [];
  for (const [docId, raw] of combined) {
    const row = selectDocument.get(docId);
    if (!row) continue;
    ranked.push({ row, score: row.length > 0 ? raw / Math.sqrt(row.length) : raw });
  }
  ranked.sort((a, b) => b.score - a.score || a.row.id - b.row.id);

  return {
    hits: ranked.slice(0, query.size).map(({ row, score }) => ({
      passage: { id: row.id, content: row.content, createdAt: row.created_at },
      score
    })),
    total: ranked.length
  };
}

/**
 * Inverted index over passage content kept in its own SQLite database, opened
 * on the first call.
 *
 * - postings: term -> (doc, tf), analyzed with `tokenize` (stopwords kept)
 * - fuzzy expansion scans the vocabulary with a bounded edit distance;
 *   a term at distance d contributes with weight 1 / (1 + d)
 * - score: sum of tf * idf * weight, divided by sqrt(document length)
 */
export function createSearchIndex(connect: Connect): SearchIndex {
  const database = withSetup(connect, ensureIndexSchema);

  return {
    indexDocument(passage) {
      return settle(() => writeDocument(database(), passage));
    },

    query(query) {
      return settle(() => runQuery(database(), query));
    },

    documentCount() {
      return settle(() => countDocuments(database()));
    },

    ping() {
      return settle(() => {
        database().prepare('SELECT 1').get();
        return true as const;
      });
    }
  };
}
