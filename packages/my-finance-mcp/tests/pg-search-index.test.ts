import { describe, it, expect, beforeEach, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import type { IndexEntry } from '../src/types/transaction.js';

const { mockQuery } = vi.hoisted(() => ({ mockQuery: vi.fn() }));

vi.mock('../src/db/pg-client.js', () => ({
  queryWithRetry: mockQuery,
  float32ToVectorLiteral: (vec: Float32Array) => `[${Array.from(vec).join(',')}]`,
}));

const { PgSearchIndex, agenticFlowEmbedder } = await import('../src/search/pg-search-index.js');

const embed = vi.fn(async () => new Float32Array([0.5, 0.25]));

const coffee: IndexEntry = {
  id: 'txn_1',
  document: 'Date: 2024-01-02 Amount: -4.5 Description: Coffee Category: Food',
  attributes: { date: '2024-01-02', amount: -4.5, description: 'Coffee', category: 'Food', id: 'txn_1' },
};
const rent: IndexEntry = {
  id: 'txn_2',
  document: 'Date: 2024-01-01 Amount: -1200 Description: Rent Category: Housing',
  attributes: { date: '2024-01-01', amount: -1200, description: 'Rent', category: 'Housing', id: 'txn_2' },
};

function sqlCalls(fragment: string): unknown[][] {
  return mockQuery.mock.calls.filter(call => String(call[0]).includes(fragment));
}

describe('PgSearchIndex', () => {
  beforeEach(() => {
    mockQuery.mockReset();
    mockQuery.mockResolvedValue({ rows: [], rowCount: 0 });
    embed.mockClear();
  });

  it('creates the schema once, then inserts the batch in one statement', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });

    await index.insert([coffee, rent]);
    await index.insert([{ ...coffee, id: 'txn_3' }]);

    expect(sqlCalls('CREATE TABLE IF NOT EXISTS transaction_index')).toHaveLength(1);

    const [sql, params] = sqlCalls('INSERT INTO transaction_index')[0];
    expect(sql).toContain(
      '($1, $2, $3, $4::jsonb, $5::ruvector), ($1, $6, $7, $8::jsonb, $9::ruvector)',
    );
    expect(params).toEqual([
      'test',
      'txn_1', coffee.document, JSON.stringify(coffee.attributes), '[0.5,0.25]',
      'txn_2', rent.document, JSON.stringify(rent.attributes), '[0.5,0.25]',
    ]);
    expect(embed).toHaveBeenCalledWith(coffee.document);
  });

  it('skips the database for an empty batch', async () => {
    const index = new PgSearchIndex({ embed });
    await index.insert([]);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it('queries by embedding distance and returns attribute bags', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const index = new PgSearchIndex({ collection: 'test', embed });
    mockQuery
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ attributes: coffee.attributes }, { attributes: 'garbage' }] });

    const results = await index.queryNearest('coffee', 10);

    expect(results).toEqual([coffee.attributes]);
    const [sql, params] = mockQuery.mock.calls[1];
    expect(sql).toContain('ORDER BY embedding <=> $2::ruvector');
    expect(params).toEqual(['test', '[0.5,0.25]', 10]);
    expect(warn).toHaveBeenCalledWith('[pg-index] skipping row with malformed attributes');
    warn.mockRestore();
  });

  it('deletes by JSONB equality and reports the row count', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });
    mockQuery
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [], rowCount: 2 });

    expect(await index.deleteWhere(coffee.attributes)).toBe(2);

    const [sql, params] = mockQuery.mock.calls[1];
    expect(sql).toContain('attributes = $2::jsonb');
    expect(params).toEqual(['test', JSON.stringify(coffee.attributes)]);
  });

  it('deletes by id', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });
    mockQuery
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 });

    expect(await index.deleteByIds(['txn_1'])).toBe(1);
    expect(mockQuery.mock.calls[1][1]).toEqual(['test', ['txn_1']]);
  });

  it('does not query for an empty id list', async () => {
    const index = new PgSearchIndex({ embed });
    expect(await index.deleteByIds([])).toBe(0);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it('lists ids for the collection', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });
    mockQuery
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ id: 'txn_1' }, { id: 'txn_2' }] });

    expect(await index.listIds()).toEqual(['txn_1', 'txn_2']);
  });

  it('reset clears the collection and returns a new handle', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });

    const fresh = await index.reset();

    expect(fresh).toBeInstanceOf(PgSearchIndex);
    expect(fresh).not.toBe(index);
    expect(mockQuery).toHaveBeenCalledWith('DELETE FROM transaction_index WHERE collection = $1', ['test']);
  });

  it('reset tolerates a missing table', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });
    mockQuery.mockRejectedValueOnce(
      Object.assign(new Error('relation "transaction_index" does not exist'), { code: '42P01' }),
    );

    await expect(index.reset()).resolves.toBeInstanceOf(PgSearchIndex);
  });

  it('reset surfaces other database errors', async () => {
    const index = new PgSearchIndex({ collection: 'test', embed });
    mockQuery.mockRejectedValueOnce(new Error('permission denied'));

    await expect(index.reset()).rejects.toThrow('permission denied');
  });
});

describe('agenticFlowEmbedder', () => {
  it('loads reasoningbank lazily and returns a Float32Array', async () => {
    const load = vi.fn(async () => ({ computeEmbedding: async (_text: string) => [0.5, 0.25] }));
    const embedder = agenticFlowEmbedder(load);

    expect(load).not.toHaveBeenCalled();
    expect(await embedder('Coffee')).toEqual(new Float32Array([0.5, 0.25]));
    expect(load).toHaveBeenCalledWith('agentic-flow/reasoningbank');
  });

  it('names the optional package when it is not installed', async () => {
    const embedder = agenticFlowEmbedder(async () => {
      throw new Error("Cannot find package 'agentic-flow'");
    });

    await expect(embedder('Coffee')).rejects.toThrow(
      `[pg-index] the postgres backend needs the optional "agentic-flow" package: Cannot find package 'agentic-flow'`,
    );
  });

  it('rejects a module without computeEmbedding', async () => {
    const embedder = agenticFlowEmbedder(async () => ({}));
    await expect(embedder('Coffee')).rejects.toThrow();
  });

  it('is not part of the default install', async () => {
    const manifest = JSON.parse(await readFile(new URL('../package.json', import.meta.url), 'utf-8'));
    expect(manifest.dependencies).not.toHaveProperty('agentic-flow');
    expect(manifest.optionalDependencies).toHaveProperty('agentic-flow');
  });
});
