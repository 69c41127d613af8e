// PgSearchIndex — ruvector-postgres backed SearchIndex
// Embeddings come from agentic-flow (384-dim all-MiniLM-L6-v2); attribute filters
// use JSONB equality, which compares keys and values exactly.

import { z } from 'zod';
import { float32ToVectorLiteral, queryWithRetry } from '../db/pg-client.js';
import type { AttributeBag, IndexEntry } from '../types/transaction.js';
import { AttributeBagSchema, type SearchIndex } from './search-index.js';

export type EmbedFn = (text: string) => Promise<Float32Array>;

const SCHEMA_SQL = `
  CREATE EXTENSION IF NOT EXISTS ruvector;
  CREATE TABLE IF NOT EXISTS transaction_index (
    collection  TEXT NOT NULL,
    id          TEXT NOT NULL,
    document    TEXT NOT NULL,
    attributes  JSONB NOT NULL,
    embedding   ruvector(384) NOT NULL,
    created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (collection, id)
  );
  CREATE INDEX IF NOT EXISTS idx_transaction_index_attributes
    ON transaction_index USING GIN (attributes);
`;

const UNDEFINED_TABLE = '42P01';

const EMBEDDING_MODULE = 'agentic-flow/reasoningbank';

const EmbeddingModuleSchema = z.object({
  computeEmbedding: z
    .function()
    .args(z.string())
    .returns(z.promise(z.union([z.instanceof(Float32Array), z.array(z.number())]))),
});

export type ModuleLoader = (specifier: string) => Promise<unknown>;

// agentic-flow is an optional dependency: the specifier is a plain string so the
// project still type-checks and runs the local backend when it is not installed.
const importOptional: ModuleLoader = specifier => import(specifier);

/**
 * Embedder backed by agentic-flow's reasoningbank (384-dim all-MiniLM-L6-v2).
 * The model is fetched by agentic-flow on first use.
 */
export function agenticFlowEmbedder(load: ModuleLoader = importOptional): EmbedFn {
  return async text => {
    let mod: unknown;
    try {
      mod = await load(EMBEDDING_MODULE);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`[pg-index] the postgres backend needs the optional "agentic-flow" package: ${msg}`, { cause: err });
    }
    const { computeEmbedding } = EmbeddingModuleSchema.parse(mod);
    return Float32Array.from(await computeEmbedding(text));
  };
}

function isUndefinedTable(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNDEFINED_TABLE;
}

export interface PgSearchIndexOptions {
  collection?: string;
  embed?: EmbedFn;
}

export class PgSearchIndex implements SearchIndex {
  private schemaReady = false;
  private readonly collection: string;
  private readonly embed: EmbedFn;

  constructor(options: PgSearchIndexOptions = {}) {
    this.collection = options.collection ?? 'transactions';
    this.embed = options.embed ?? agenticFlowEmbedder();
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaReady) return;
    await queryWithRetry(SCHEMA_SQL, []);
    this.schemaReady = true;
  }

  async insert(entries: readonly IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.ensureSchema();

    const params: unknown[] = [this.collection];
    const rows: string[] = [];
    for (const entry of entries) {
      const vec = float32ToVectorLiteral(await this.embed(entry.document));
      const base = params.length;
      params.push(entry.id, entry.document, JSON.stringify(entry.attributes), vec);
      rows.push(`($1, $${base + 1}, $${base + 2}, $${base + 3}::jsonb, $${base + 4}::ruvector)`);
    }

    await queryWithRetry(
      `INSERT INTO transaction_index (collection, id, document, attributes, embedding)
       VALUES ${rows.join(', ')}`,
      params,
    );
  }

  async queryNearest(text: string, k: number): Promise<AttributeBag[]> {
    await this.ensureSchema();
    const vec = float32ToVectorLiteral(await this.embed(text));

    const { rows } = await queryWithRetry<{ attributes: unknown }>(
      `SELECT attributes FROM transaction_index
       WHERE collection = $1
       ORDER BY embedding <=> $2::ruvector
       LIMIT $3`,
      [this.collection, vec, k],
    );

    const bags: AttributeBag[] = [];
    for (const row of rows) {
      const parsed = AttributeBagSchema.safeParse(row.attributes);
      if (parsed.success) {
        bags.push(parsed.data);
      } else {
        console.warn('[pg-index] skipping row with malformed attributes');
      }
    }
    return bags;
  }

  async deleteWhere(attributes: AttributeBag): Promise<number> {
    await this.ensureSchema();
    const result = await queryWithRetry(
      'DELETE FROM transaction_index WHERE collection = $1 AND attributes = $2::jsonb',
      [this.collection, JSON.stringify(attributes)],
    );
    return result.rowCount ?? 0;
  }

  async deleteByIds(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;
    await this.ensureSchema();
    const result = await queryWithRetry(
      'DELETE FROM transaction_index WHERE collection = $1 AND id = ANY($2::text[])',
      [this.collection, [...ids]],
    );
    return result.rowCount ?? 0;
  }

  async listIds(): Promise<string[]> {
    await this.ensureSchema();
    const { rows } = await queryWithRetry<{ id: string }>(
      'SELECT id FROM transaction_index WHERE collection = $1 ORDER BY created_at, id',
      [this.collection],
    );
    return rows.map(r => r.id);
  }

  async reset(): Promise<SearchIndex> {
    try {
      await queryWithRetry('DELETE FROM transaction_index WHERE collection = $1', [this.collection]);
    } catch (err) {
      // Nothing to drop yet
      if (!isUndefinedTable(err)) throw err;
    }
    return new PgSearchIndex({ collection: this.collection, embed: this.embed });
  }
}
