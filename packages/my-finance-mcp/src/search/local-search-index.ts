// Local search index — embedded collection persisted as JSON in the index directory
// Ranks by keyword overlap with the rendered document; no embedding model needed.

import { readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { AttributeBag, IndexEntry } from '../types/transaction.js';
import { AttributeBagSchema, attributesEqual, type SearchIndex } from './search-index.js';

const CollectionFileSchema = z.object({
  collection: z.string(),
  entries: z.array(z.object({
    id: z.string(),
    document: z.string(),
    attributes: AttributeBagSchema,
  })),
});

type CollectionFile = z.infer<typeof CollectionFileSchema>;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function keywordScore(query: string, document: string): number {
  const words = query.toLowerCase().split(/\s+/).filter(w => w.length > 0);
  if (words.length === 0) return 0;
  const content = document.toLowerCase();
  return words.filter(w => content.includes(w)).length / words.length;
}

export class LocalSearchIndex implements SearchIndex {
  private entries: Map<string, IndexEntry> | null = null;

  constructor(
    private readonly dir: string,
    private readonly collection = 'transactions',
  ) {}

  get filePath(): string {
    return join(this.dir, `${this.collection}.json`);
  }

  private async ensureLoaded(): Promise<Map<string, IndexEntry>> {
    if (this.entries) return this.entries;

    const map = new Map<string, IndexEntry>();
    try {
      const raw = await readFile(this.filePath, 'utf-8');
      const parsed = CollectionFileSchema.parse(JSON.parse(raw));
      for (const entry of parsed.entries) map.set(entry.id, entry);
    } catch (err) {
      if (!isNotFound(err)) {
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`[local-index] collection "${this.collection}" unreadable, starting empty: ${msg}`);
      }
    }
    this.entries = map;
    return map;
  }

  // Mutations work on a copy; the cache only moves forward once the file is written
  private async commit(next: Map<string, IndexEntry>): Promise<void> {
    const body: CollectionFile = { collection: this.collection, entries: [...next.values()] };
    const tmp = `${this.filePath}.tmp-${process.pid}`;
    await writeFile(tmp, JSON.stringify(body), 'utf-8');
    await rename(tmp, this.filePath);
    this.entries = next;
  }

  async insert(entries: readonly IndexEntry[]): Promise<void> {
    const next = new Map(await this.ensureLoaded());
    for (const entry of entries) {
      if (next.has(entry.id)) {
        throw new Error(`[local-index] duplicate id "${entry.id}"`);
      }
      next.set(entry.id, entry);
    }
    await this.commit(next);
  }

  async queryNearest(text: string, k: number): Promise<AttributeBag[]> {
    const map = await this.ensureLoaded();
    return [...map.values()]
      .map(entry => ({ entry, score: keywordScore(text, entry.document) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map(r => r.entry.attributes);
  }

  async deleteWhere(attributes: AttributeBag): Promise<number> {
    const next = new Map(await this.ensureLoaded());
    let removed = 0;
    for (const [id, entry] of next) {
      if (attributesEqual(entry.attributes, attributes)) {
        next.delete(id);
        removed++;
      }
    }
    if (removed > 0) await this.commit(next);
    return removed;
  }

  async deleteByIds(ids: readonly string[]): Promise<number> {
    const next = new Map(await this.ensureLoaded());
    let removed = 0;
    for (const id of ids) {
      if (next.delete(id)) removed++;
    }
    if (removed > 0) await this.commit(next);
    return removed;
  }

  async listIds(): Promise<string[]> {
    const map = await this.ensureLoaded();
    return [...map.keys()];
  }

  async reset(): Promise<SearchIndex> {
    try {
      await unlink(this.filePath);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    this.entries = null;
    return new LocalSearchIndex(this.dir, this.collection);
  }
}
