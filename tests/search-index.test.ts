import { describe, it, expect, vi } from 'vitest';
import { lazyConnect } from '../src/db/client.js';
import { type IndexQuery, type SearchIndex, createSearchIndex } from '../src/fulltext/searchIndex.js';
import { boundedEditDistance } from '../src/utils/editDistance.js';
import { passage, unusableDbPath } from './helpers.js';

async function indexWith(contents: string[]) {
  const index = createSearchIndex(lazyConnect(':memory:'));
  for (const [i, content] of contents.entries()) {
    const r = await index.indexDocument(passage(i + 1, content));
    if (!r.ok) throw r.error;
  }
  return index;
}

async function ids(index: SearchIndex, query: Partial<IndexQuery> & Pick<IndexQuery, 'clauses'>) {
  const r = await index.query({ operator: 'AND', fuzziness: 2, size: 10, ...query });
  if (!r.ok) throw r.error;
  return { ids: r.value.hits.map((h) => h.passage.id), total: r.value.total, hits: r.value.hits };
}

describe('bounded edit distance', () => {
  it('computes small distances and caps large ones', () => {
    expect(boundedEditDistance('python', 'python', 2)).toBe(0);
    expect(boundedEditDistance('lamp', 'camp', 2)).toBe(1);
    expect(boundedEditDistance('pyhton', 'python', 2)).toBe(2);
    expect(boundedEditDistance('rarewordone', 'rarewordtwo', 2)).toBe(3);
    expect(boundedEditDistance('cat', 'elephant', 2)).toBe(3);
  });
});

describe('sqlite search index', () => {
  const corpus = ['Python programming is fun', 'Advanced python programming patterns', 'Ruby on rails'];

  it('requires every clause under AND', async () => {
    const index = await indexWith(corpus);
    expect(await ids(index, { clauses: ['python', 'programming'] })).toMatchObject({ ids: [1, 2], total: 2 });
    expect(await ids(index, { clauses: ['ruby', 'python'] })).toMatchObject({ ids: [], total: 0 });
  });

  it('accepts any clause under OR', async () => {
    const index = await indexWith(corpus);
    expect(await ids(index, { clauses: ['ruby', 'javascript'], operator: 'OR' })).toMatchObject({ ids: [3], total: 1 });
    // ruby is rarer and its passage shorter
    expect(await ids(index, { clauses: ['ruby', 'python'], operator: 'OR' })).toMatchObject({ ids: [3, 1, 2], total: 3 });
  });

  it('matches misspellings within two edits', async () => {
    const index = await indexWith(corpus);
    expect(await ids(index, { clauses: ['pyhton'] })).toMatchObject({ ids: [1, 2], total: 2 });
    expect(await ids(index, { clauses: ['pyhton'], fuzziness: 0 })).toMatchObject({ ids: [], total: 0 });
  });

  it('ranks exact matches above fuzzy ones', async () => {
    const index = await indexWith(['camp', 'lamp']);
    const result = await ids(index, { clauses: ['lamp'], operator: 'OR' });
    expect(result.ids).toEqual([2, 1]);
    expect(result.hits[0].score).toBeGreaterThan(result.hits[1].score);
  });

  it('ranks by term frequency', async () => {
    const index = await indexWith(['cat dog dog dog', 'cat cat cat dog']);
    expect((await ids(index, { clauses: ['cat'] })).ids).toEqual([2, 1]);
  });

  it('caps hits at the requested size but reports every match', async () => {
    const index = await indexWith(Array.from({ length: 15 }, (_, i) => `Harbor story ${i}`));
    const result = await ids(index, { clauses: ['harbor'], size: 10 });
    expect(result.ids).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(result.total).toBe(15);
  });

  it('re-indexing a passage replaces its terms', async () => {
    const index = createSearchIndex(lazyConnect(':memory:'));
    await index.indexDocument(passage(1, 'alpha'));
    await index.indexDocument(passage(1, 'beta'));
    expect(await ids(index, { clauses: ['alpha'], fuzziness: 0 })).toMatchObject({ ids: [], total: 0 });
    expect(await ids(index, { clauses: ['beta'] })).toMatchObject({ ids: [1], total: 1 });
    expect(await index.documentCount()).toEqual({ ok: true, value: 1 });
  });

  it('answers an empty index with no hits', async () => {
    const index = createSearchIndex(lazyConnect(':memory:'));
    expect(await ids(index, { clauses: ['anything'] })).toMatchObject({ ids: [], total: 0 });
  });

  it('fails a query with no clauses', async () => {
    const index = await indexWith(corpus);
    const r = await index.query({ clauses: [], operator: 'OR', fuzziness: 2, size: 10 });
    expect(r.ok).toBe(false);
  });
});

describe('sqlite search index connection', () => {
  it('turns a file that is not a database into failed results', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const index = createSearchIndex(lazyConnect(unusableDbPath('index.sqlite')));

    expect((await index.indexDocument(passage(1, 'harbor lights'))).ok).toBe(false);
    expect((await index.query({ clauses: ['harbor'], operator: 'AND', fuzziness: 2, size: 10 })).ok).toBe(false);
    expect((await index.ping()).ok).toBe(false);
    vi.restoreAllMocks();
  });
});
