// Search Index — semantic collection mirrored from the ledger
// Entries are keyed by opaque ids and carry the rendered document text plus the
// stored transaction as an attribute bag.

import { z } from 'zod';
import type { AttributeBag, IndexEntry, StoredTransaction } from '../types/transaction.js';

export const AttributeBagSchema = z.record(z.union([z.string(), z.number()]));

export interface SearchIndex {
  insert(entries: readonly IndexEntry[]): Promise<void>;
  /** Attribute bags in similarity order. No score threshold: all top-k come back. */
  queryNearest(text: string, k: number): Promise<AttributeBag[]>;
  /** Remove every entry whose bag has exactly these keys and values. */
  deleteWhere(attributes: AttributeBag): Promise<number>;
  deleteByIds(ids: readonly string[]): Promise<number>;
  listIds(): Promise<string[]>;
  /** Drop the collection and resolve to a fresh handle over an empty one. */
  reset(): Promise<SearchIndex>;
}

export function renderDocument(txn: StoredTransaction): string {
  return `Date: ${txn.date} Amount: ${txn.amount} Description: ${txn.description} Category: ${txn.category}`;
}

export function toAttributeBag(txn: StoredTransaction): AttributeBag {
  const bag: Record<string, string | number> = {
    date: txn.date,
    amount: txn.amount,
    description: txn.description,
    category: txn.category,
  };
  if (txn.id !== undefined) bag.id = txn.id;
  return bag;
}

export function toIndexEntry(txn: StoredTransaction & { id: string }): IndexEntry {
  return { id: txn.id, document: renderDocument(txn), attributes: toAttributeBag(txn) };
}

export function attributesEqual(a: AttributeBag, b: AttributeBag): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every(k => Object.prototype.hasOwnProperty.call(b, k) && a[k] === b[k]);
}
