// Ledger context — the pair of store handles every operation works against

import type { LedgerStore } from './ledger/ledger-store.js';
import type { SearchIndex } from './search/search-index.js';

export interface LedgerContext {
  readonly ledger: LedgerStore;
  readonly index: SearchIndex;
  /** Optional deadline for index queries. */
  readonly queryTimeoutMs?: number;
}

export function withIndex(ctx: LedgerContext, index: SearchIndex): LedgerContext {
  return { ...ctx, index };
}
