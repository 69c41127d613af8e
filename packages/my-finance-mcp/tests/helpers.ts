import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LedgerContext } from '../src/context.js';
import { JsonLedgerStore } from '../src/ledger/ledger-store.js';
import { LocalSearchIndex } from '../src/search/local-search-index.js';

export interface TempLedger {
  dir: string;
  indexDir: string;
  ledger: JsonLedgerStore;
  index: LocalSearchIndex;
  ctx: LedgerContext;
  cleanup(): Promise<void>;
}

export async function createTempLedger(): Promise<TempLedger> {
  const dir = await mkdtemp(join(tmpdir(), 'my-finance-'));
  // Same layout as a real data directory: ledger at the top, index collection below
  const indexDir = join(dir, 'financial_data');
  await mkdir(indexDir);
  const ledger = new JsonLedgerStore(join(dir, 'transactions.json'));
  const index = new LocalSearchIndex(indexDir, 'transactions');
  return {
    dir,
    indexDir,
    ledger,
    index,
    ctx: { ledger, index },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/** Deterministic ids: txn_1, txn_2, ... */
export function sequentialIds(prefix = 'txn_'): () => string {
  let n = 0;
  return () => `${prefix}${++n}`;
}
