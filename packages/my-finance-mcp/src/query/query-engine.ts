// Query Engine — semantic search over the index, summarised with totals

import type { LedgerContext } from '../context.js';
import { IndexTimeoutError } from '../errors.js';
import type { AttributeBag } from '../types/transaction.js';

export const QUERY_RESULT_LIMIT = 10;
export const SUMMARY_LINE_LIMIT = 5;
export const NO_MATCH_MESSAGE = 'No matching transactions found.';

export function numericAmount(bag: AttributeBag): number {
  const amount = bag.amount;
  return typeof amount === 'number' && Number.isFinite(amount) ? amount : 0;
}

export function summarizeResults(results: readonly AttributeBag[]): string {
  if (results.length === 0) return NO_MATCH_MESSAGE;

  const total = results.reduce((sum, bag) => sum + numericAmount(bag), 0);
  const lines = [
    `Found ${results.length} relevant transactions.`,
    `Total amount: $${total.toFixed(2)}`,
    '',
    'Recent transactions:',
  ];
  // Rank order from the index, not chronological
  for (const bag of results.slice(0, SUMMARY_LINE_LIMIT)) {
    lines.push(`- ${bag.date ?? ''}: $${numericAmount(bag).toFixed(2)} - ${bag.description ?? ''}`);
  }
  return lines.join('\n') + '\n';
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs?: number): Promise<T> {
  if (timeoutMs === undefined) return work;

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new IndexTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export async function queryFinancialHistory(ctx: LedgerContext, query: string): Promise<string> {
  const results = await withTimeout(
    ctx.index.queryNearest(query, QUERY_RESULT_LIMIT),
    ctx.queryTimeoutMs,
  );
  return summarizeResults(results);
}
