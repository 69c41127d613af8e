// Ingestion Pipeline — validate, assign ids, write the index, then the ledger

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { LedgerContext } from '../context.js';
import { IngestionError, LedgerValidationError } from '../errors.js';
import { TransactionInputSchema } from '../schemas/transactions.js';
import { toIndexEntry } from '../search/search-index.js';
import type { TransactionRecord } from '../types/transaction.js';

export function generateTransactionId(): string {
  return `txn_${randomUUID()}`;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw batch. The whole batch is rejected if any record is invalid.
 */
export function parseTransactions(batch: readonly unknown[]): TransactionRecord[] {
  const parsed = z.array(TransactionInputSchema).safeParse(batch);
  if (!parsed.success) {
    throw new LedgerValidationError(`Invalid transactions: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export interface IngestionOptions {
  generateId?: () => string;
}

/**
 * Store a batch in both stores. The index is written first: if it fails, the
 * ledger is never touched, so no ledger row exists without an index entry.
 */
export async function storeTransactions(
  ctx: LedgerContext,
  batch: readonly unknown[],
  options: IngestionOptions = {},
): Promise<number> {
  const records = parseTransactions(batch);
  if (records.length === 0) return 0;

  const nextId = options.generateId ?? generateTransactionId;
  const stored = records.map(r => ({ id: nextId(), ...r }));

  try {
    await ctx.index.insert(stored.map(toIndexEntry));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new IngestionError(
      `Search index rejected ${stored.length} transactions; ledger left unchanged: ${msg}`,
      stored.length,
      { cause: err },
    );
  }

  await ctx.ledger.append(stored);
  return stored.length;
}
