// Lifecycle Manager — positional listing and the two-store delete protocol
// Positions are recomputed on every read; they are only meaningful between a
// list and the delete that follows it.

import type { LedgerContext } from '../context.js';
import { withIndex } from '../context.js';
import { LedgerValidationError } from '../errors.js';
import { toAttributeBag } from '../search/search-index.js';
import type {
  DeleteOptions,
  ListOptions,
  ListedTransaction,
  StoredTransaction,
  TransactionPage,
} from '../types/transaction.js';

export const DEFAULT_PAGE_LIMIT = 20;

export async function listTransactions(
  ctx: LedgerContext,
  options: ListOptions = {},
): Promise<TransactionPage> {
  const limit = Math.max(0, options.limit ?? DEFAULT_PAGE_LIMIT);
  const offset = Math.max(0, options.offset ?? 0);
  const category = options.category?.toLowerCase();

  const rows = await ctx.ledger.load();
  let tagged: ListedTransaction[] = rows.map((txn, index) => ({ ...txn, index }));
  if (category !== undefined) {
    tagged = tagged.filter(t => t.category.toLowerCase() === category);
  }

  const total = tagged.length;
  return {
    total,
    offset,
    limit,
    transactions: tagged.slice(offset, offset + limit),
    hasMore: offset + limit < total,
  };
}

export interface DeleteResult {
  readonly message: string;
  readonly removed: number;
  /** Context to use from now on; carries a fresh index handle after a full reset. */
  readonly context: LedgerContext;
}

export const NOTHING_TO_DELETE = 'No transactions to delete.';
export const NO_INDEX_MATCH = 'No transactions matched the given indices.';

async function removeFromIndex(ctx: LedgerContext, txn: StoredTransaction): Promise<void> {
  try {
    if (txn.id !== undefined) {
      await ctx.index.deleteByIds([txn.id]);
    } else {
      // Rows without an id can only be matched by value; identical rows go together
      await ctx.index.deleteWhere(toAttributeBag(txn));
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.warn(`[lifecycle] index cleanup failed for ${txn.id ?? txn.description}: ${msg}`);
  }
}

export async function deleteTransactions(
  ctx: LedgerContext,
  options: DeleteOptions,
): Promise<DeleteResult> {
  if (options.confirm !== true) {
    throw new LedgerValidationError('Deletion requires confirm=true. No transactions were deleted.');
  }

  if (options.deleteAll === true) {
    const rows = await ctx.ledger.load();
    // The collection is recreated even for an empty ledger so stale entries cannot outlive it
    await ctx.ledger.save([]);
    const index = await ctx.index.reset();
    return {
      message: rows.length === 0 ? NOTHING_TO_DELETE : `Deleted all ${rows.length} transactions.`,
      removed: rows.length,
      context: withIndex(ctx, index),
    };
  }

  const indices = options.indices ?? [];
  if (indices.length === 0) {
    throw new LedgerValidationError('Specify indices to delete or set delete_all=true.');
  }

  const wanted = new Set(indices);
  const rows = await ctx.ledger.load();
  const removed: StoredTransaction[] = [];
  const remaining: StoredTransaction[] = [];
  rows.forEach((txn, i) => (wanted.has(i) ? removed : remaining).push(txn));

  if (removed.length === 0) {
    return { message: NO_INDEX_MATCH, removed: 0, context: ctx };
  }

  // Ledger first: an index failure below leaves stale entries, never lost rows
  await ctx.ledger.save(remaining);
  for (const txn of removed) {
    await removeFromIndex(ctx, txn);
  }

  return {
    message: `Deleted ${removed.length} transactions. ${remaining.length} remaining.`,
    removed: removed.length,
    context: ctx,
  };
}
