#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadSettings } from './config/settings.js';
import { LedgerSession } from './session.js';
import { registerTransactionTools } from './tools/transactions.js';

const settings = loadSettings();
const session = await LedgerSession.open(settings);

if (settings.reconcileOnStart) {
  const { reinserted, removed } = await session.reconcile();
  console.error(`[my-finance] startup reconcile: ${reinserted} re-inserted, ${removed} removed`);
}

const server = new McpServer({
  name: 'my-finance',
  version: '0.1.0',
});

registerTransactionTools(server, session);

const transport = new StdioServerTransport();
await server.connect(transport);
