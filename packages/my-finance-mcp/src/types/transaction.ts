// Transaction ledger domain types

export interface TransactionRecord {
  readonly date: string;
  readonly amount: number;
  readonly description: string;
  readonly category: string;
}

/**
 * A ledger row. `id` is written at ingestion and mirrored into the index
 * attribute bag; rows persisted before ids existed have none.
 */
export interface StoredTransaction extends TransactionRecord {
  readonly id?: string;
}

/** Flat key/value view of a stored transaction, used as an exact-match filter. */
export type AttributeBag = Readonly<Record<string, string | number>>;

export interface IndexEntry {
  readonly id: string;
  readonly document: string;
  readonly attributes: AttributeBag;
}

export interface ListedTransaction extends StoredTransaction {
  readonly index: number;
}

export interface TransactionPage {
  readonly total: number;
  readonly offset: number;
  readonly limit: number;
  readonly transactions: ListedTransaction[];
  readonly hasMore: boolean;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
  category?: string | null;
}

export interface DeleteOptions {
  indices?: number[] | null;
  deleteAll?: boolean;
  confirm?: boolean;
}

export interface ReconcileReport {
  readonly reinserted: number;
  readonly removed: number;
}
