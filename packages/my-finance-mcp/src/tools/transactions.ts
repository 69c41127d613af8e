import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { toolCall, type ToolResponse } from '../formatters/response.js';
import type { LedgerSession } from '../session.js';
import {
  DeleteTransactionsSchema,
  ListTransactionsSchema,
  QueryHistorySchema,
  StoreTransactionsSchema,
} from '../schemas/transactions.js';

export interface TransactionToolHandlers {
  storeTransactions(params: unknown): Promise<ToolResponse>;
  queryFinancialHistory(params: unknown): Promise<ToolResponse>;
  listTransactions(params: unknown): Promise<ToolResponse>;
  deleteTransactions(params: unknown): Promise<ToolResponse>;
  reconcileIndex(): Promise<ToolResponse>;
}

export function createTransactionHandlers(session: LedgerSession): TransactionToolHandlers {
  return {
    storeTransactions: params => toolCall(async () => {
      const { transactions } = StoreTransactionsSchema.parse(params);
      const count = await session.store(transactions);
      return `Stored ${count} transactions successfully`;
    }),

    queryFinancialHistory: params => toolCall(async () => {
      const { query } = QueryHistorySchema.parse(params);
      return session.query(query);
    }),

    listTransactions: params => toolCall(async () => {
      const { limit, offset, category } = ListTransactionsSchema.parse(params);
      return session.list({ limit, offset, category });
    }),

    deleteTransactions: params => toolCall(async () => {
      const { indices, delete_all, confirm } = DeleteTransactionsSchema.parse(params);
      return session.delete({ indices, deleteAll: delete_all, confirm });
    }),

    reconcileIndex: () => toolCall(async () => {
      const { reinserted, removed } = await session.reconcile();
      return `Reconciled index: ${reinserted} re-inserted, ${removed} removed.`;
    }),
  };
}

export function registerTransactionTools(server: McpServer, session: LedgerSession) {
  const handlers = createTransactionHandlers(session);

  server.tool(
    'store_transactions',
    'Parse and store transaction data from uploaded financial documents. If you receive unstructured financial data (statements, receipts, CSV files), extract transactions into [{"date": "YYYY-MM-DD", "amount": number, "description": "string", "category": "string"}]. Amounts are negative for expenses; category is optional. Returns a confirmation with the stored count.',
    StoreTransactionsSchema.shape,
    async (params) => handlers.storeTransactions(params),
  );

  server.tool(
    'query_financial_history',
    'Search all stored transactions with semantic search. Returns the number of relevant transactions, their total amount, and up to five of the closest matches.',
    QueryHistorySchema.shape,
    async (params) => handlers.queryFinancialHistory(params),
  );

  server.tool(
    'list_transactions',
    'List stored transactions with their current ledger index, newest last. Supports pagination (limit, offset) and a case-insensitive exact category filter. Indices change after any deletion: list again before deleting.',
    ListTransactionsSchema.shape,
    async (params) => handlers.listTransactions(params),
  );

  server.tool(
    'delete_transactions',
    'Delete transactions by the indices returned from list_transactions, or all of them with delete_all=true. Nothing is deleted unless confirm=true.',
    DeleteTransactionsSchema.shape,
    async (params) => handlers.deleteTransactions(params),
  );

  server.tool(
    'reconcile_index',
    'Repair drift between the transaction ledger and the search index: re-index ledger transactions missing from the index and remove index entries with no ledger transaction.',
    async () => handlers.reconcileIndex(),
  );
}
