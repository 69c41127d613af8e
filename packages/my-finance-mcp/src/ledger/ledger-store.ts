// Ledger Store — the JSON file that is the source of truth for transactions
// Whole-file load and whole-file overwrite; no locking across processes, so two
// processes mutating the same file can lose an update (last write wins).

import { readFile, rename, writeFile } from 'node:fs/promises';
import type { StoredTransaction } from '../types/transaction.js';

export interface LedgerStore {
  load(): Promise<StoredTransaction[]>;
  save(records: readonly StoredTransaction[]): Promise<void>;
  append(records: readonly StoredTransaction[]): Promise<StoredTransaction[]>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise one persisted row. Rows written by older versions may lack a
 * category or an id; the category falls back to "unknown".
 */
export function normalizeRow(row: Record<string, unknown>): StoredTransaction {
  const amount = typeof row.amount === 'number' ? row.amount : Number(row.amount);
  const category = typeof row.category === 'string' && row.category.trim() !== ''
    ? row.category
    : 'unknown';
  const base = {
    date: String(row.date ?? ''),
    amount: Number.isFinite(amount) ? amount : 0,
    description: String(row.description ?? ''),
    category,
  };
  return typeof row.id === 'string' && row.id !== '' ? { id: row.id, ...base } : base;
}

export class JsonLedgerStore implements LedgerStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StoredTransaction[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      await this.quarantine(err instanceof Error ? err.message : String(err));
      return [];
    }

    if (!Array.isArray(parsed)) {
      await this.quarantine('top-level value is not an array');
      return [];
    }

    const rows: StoredTransaction[] = [];
    parsed.forEach((row, i) => {
      if (isObject(row)) {
        rows.push(normalizeRow(row));
      } else {
        console.warn(`[ledger-store] skipping row ${i}: not an object`);
      }
    });
    return rows;
  }

  async save(records: readonly StoredTransaction[]): Promise<void> {
    // Write beside the ledger, then rename over it
    const tmp = `${this.filePath}.tmp-${process.pid}`;
    await writeFile(tmp, JSON.stringify(records, null, 2) + '\n', 'utf-8');
    await rename(tmp, this.filePath);
  }

  async append(records: readonly StoredTransaction[]): Promise<StoredTransaction[]> {
    const existing = await this.load();
    const next = [...existing, ...records];
    await this.save(next);
    return next;
  }

  // A corrupt ledger reads as empty; the file is moved aside first so the next
  // save does not overwrite what is left of it.
  private async quarantine(reason: string): Promise<void> {
    const target = `${this.filePath}.corrupt-${Date.now()}`;
    try {
      await rename(this.filePath, target);
      console.warn(`[ledger-store] ledger unreadable (${reason}); moved to ${target}, starting empty`);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`[ledger-store] ledger unreadable (${reason}); could not move it aside: ${msg}`);
    }
  }
}
