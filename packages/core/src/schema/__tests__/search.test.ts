import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  EmbeddingTableSearch,
  KeywordTableSearch,
  UnknownCorpusError,
  cosineSimilarity,
  scoreMatch,
  tokenize,
  type CorpusDocument,
} from '../search.js';

const DOCS: CorpusDocument[] = [
  { table: 'audit_log', columns: ['id', 'event'], text: 'Table audit_log' },
  { table: 'customers', columns: ['id', 'name', 'city'], text: 'Table customers' },
  { table: 'orders', columns: ['id', 'customer_id', 'total'], text: 'Table orders' },
];

describe('tokenize', () => {
  it('lowercases, splits on punctuation and drops single characters', () => {
    assert.deepEqual(tokenize('Top 5 customer_names, by a City?'), ['top', 'customer_names', 'by', 'city']);
  });
});

describe('scoreMatch', () => {
  it('ranks exact over part over substring matches', () => {
    assert.equal(scoreMatch('orders', ['orders']), 10);
    assert.equal(scoreMatch('order_items', ['items']), 5);
    assert.equal(scoreMatch('line_item', ['items']), 3);
    assert.equal(scoreMatch('users', ['orders']), 0);
  });
});

describe('KeywordTableSearch', () => {
  it('returns matching tables by score and never zero-score ones', async () => {
    const search = new KeywordTableSearch();
    await search.index('s1', DOCS);
    assert.deepEqual(await search.topK('orders total by city', 5, 's1'), ['orders', 'customers']);
  });

  it('honours k', async () => {
    const search = new KeywordTableSearch();
    await search.index('s1', DOCS);
    assert.deepEqual(await search.topK('orders total by city', 1, 's1'), ['orders']);
  });

  it('keeps corpora apart and forgets dropped ones', async () => {
    const search = new KeywordTableSearch();
    await search.index('s1', DOCS);
    await search.index('s2', [{ table: 'invoices', columns: [], text: '' }]);

    assert.deepEqual(await search.topK('invoices', 5, 's2'), ['invoices']);
    assert.deepEqual(await search.topK('invoices', 5, 's1'), []);

    await search.drop('s1');
    await assert.rejects(search.topK('orders', 5, 's1'), UnknownCorpusError);
  });
});

describe('EmbeddingTableSearch', () => {
  // one dimension per table name
  const axes = ['audit', 'customer', 'order'];
  const embed = async (texts: string[]): Promise<number[][]> =>
    texts.map((text) => axes.map((axis) => (text.toLowerCase().includes(axis) ? 1 : 0)));

  it('ranks tables by cosine similarity', async () => {
    const search = new EmbeddingTableSearch(embed);
    await search.index('s1', DOCS);
    assert.deepEqual(await search.topK('how many orders', 2, 's1'), ['orders', 'audit_log']);
  });

  it('rejects a corpus that was never indexed', async () => {
    const search = new EmbeddingTableSearch(embed);
    await assert.rejects(search.topK('orders', 2, 'missing'), UnknownCorpusError);
  });

  it('computes cosine similarity', () => {
    assert.equal(cosineSimilarity([1, 0], [1, 0]), 1);
    assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
    assert.equal(cosineSimilarity([0, 0], [1, 1]), 0);
  });
});
