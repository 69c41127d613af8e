// Reconciler — repairs drift between the ledger and the search index
// The ledger wins: missing index entries are re-inserted, orphans are deleted.

import type { LedgerContext } from '../context.js';
import { generateTransactionId } from '../pipeline/ingestion.js';
import { toIndexEntry } from '../search/search-index.js';
import type { ReconcileReport, StoredTransaction } from '../types/transaction.js';

type IdentifiedTransaction = StoredTransaction & { id: string };

export async function reconcileIndex(
  ctx: LedgerContext,
  generateId: () => string = generateTransactionId,
): Promise<ReconcileReport> {
  const rows = await ctx.ledger.load();

  // Rows from before ids existed get one so they become id-addressable
  let assigned = 0;
  const identified: IdentifiedTransaction[] = rows.map(txn => {
    if (txn.id !== undefined) return { ...txn, id: txn.id };
    assigned++;
    return { ...txn, id: generateId() };
  });
  if (assigned > 0) {
    await ctx.ledger.save(identified);
    console.warn(`[reconciler] assigned ids to ${assigned} ledger rows`);
  }

  const indexed = new Set(await ctx.index.listIds());
  const ledgerIds = new Set(identified.map(t => t.id));

  const missing = identified.filter(t => !indexed.has(t.id));
  if (missing.length > 0) {
    await ctx.index.insert(missing.map(toIndexEntry));
  }

  const orphans = [...indexed].filter(id => !ledgerIds.has(id));
  const removed = orphans.length > 0 ? await ctx.index.deleteByIds(orphans) : 0;

  return { reinserted: missing.length, removed };
}
