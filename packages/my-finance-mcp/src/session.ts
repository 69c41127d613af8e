// LedgerSession — owns the current LedgerContext for a server or CLI process
// Mutations run one at a time within this process. Separate processes sharing a
// data directory are not coordinated (see ledger-store.ts).

import type { LedgerContext } from './context.js';
import { createSearchIndex } from './config/index-backend.js';
import { ensureDataDirs, type LedgerSettings } from './config/settings.js';
import { deleteTransactions, listTransactions } from './lifecycle/lifecycle-manager.js';
import { reconcileIndex } from './lifecycle/reconciler.js';
import { JsonLedgerStore } from './ledger/ledger-store.js';
import { storeTransactions } from './pipeline/ingestion.js';
import { queryFinancialHistory } from './query/query-engine.js';
import type { DeleteOptions, ListOptions, ReconcileReport, TransactionPage } from './types/transaction.js';

export class LedgerSession {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private context: LedgerContext) {}

  static async open(settings: LedgerSettings): Promise<LedgerSession> {
    await ensureDataDirs(settings);
    const index = await createSearchIndex(settings);
    return new LedgerSession({
      ledger: new JsonLedgerStore(settings.ledgerFile),
      index,
      queryTimeoutMs: settings.queryTimeoutMs,
    });
  }

  get current(): LedgerContext {
    return this.context;
  }

  private exclusive<T>(work: (ctx: LedgerContext) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => work(this.context));
    // The caller sees the failure through `run`; the queue itself keeps going
    this.tail = run.catch(() => undefined);
    return run;
  }

  store(batch: readonly unknown[]): Promise<number> {
    return this.exclusive(ctx => storeTransactions(ctx, batch));
  }

  query(text: string): Promise<string> {
    return queryFinancialHistory(this.context, text);
  }

  list(options: ListOptions = {}): Promise<TransactionPage> {
    return listTransactions(this.context, options);
  }

  delete(options: DeleteOptions): Promise<string> {
    return this.exclusive(async ctx => {
      const result = await deleteTransactions(ctx, options);
      this.context = result.context;
      return result.message;
    });
  }

  reconcile(): Promise<ReconcileReport> {
    return this.exclusive(ctx => reconcileIndex(ctx));
  }
}
