import { z } from 'zod';

/**
 * MCP clients sometimes send numbers as strings. Only non-blank numeric strings
 * are converted; null, booleans and "" reach the number check unchanged.
 */
function numericString(value: unknown): unknown {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

export const TransactionInputSchema = z.object({
  date: z.string().min(1).describe('Transaction date (YYYY-MM-DD)'),
  amount: z
    .preprocess(numericString, z.number().finite())
    .describe('Transaction amount (negative for expenses)'),
  description: z.string().describe('Transaction description'),
  category: z
    .string()
    .nullable()
    .optional()
    .transform(c => (c && c.trim() !== '' ? c : 'unknown'))
    .describe('Transaction category, e.g. Food, Transport, Bills (defaults to "unknown")'),
});

export const StoreTransactionsSchema = z.object({
  transactions: z
    .array(TransactionInputSchema)
    .describe(
      'Transactions to store. Extract statements, receipts or CSV rows into ' +
      '[{"date": "YYYY-MM-DD", "amount": number, "description": "string", "category": "string"}]',
    ),
});

export const QueryHistorySchema = z.object({
  query: z.string().min(1).describe('Natural-language search over stored transactions'),
});

export const ListTransactionsSchema = z.object({
  limit: z.coerce.number().int().min(1).default(20).describe('Maximum transactions to return'),
  offset: z.coerce.number().int().min(0).default(0).describe('Number of matching transactions to skip'),
  category: z.string().nullable().optional().describe('Only transactions in this category (case-insensitive)'),
});

export const DeleteTransactionsSchema = z.object({
  indices: z
    .array(z.coerce.number().int().min(0))
    .nullable()
    .optional()
    .describe('Ledger positions to delete, as returned by list_transactions'),
  delete_all: z.boolean().default(false).describe('Delete every stored transaction'),
  confirm: z.boolean().default(false).describe('Must be true for any deletion to happen'),
});
