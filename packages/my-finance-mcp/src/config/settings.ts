// Settings — resolved from environment variables (dotenv is loaded by the entry points)

import { homedir } from 'node:os';
import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';

export type IndexBackend = 'local' | 'postgres';

export interface LedgerSettings {
  dataDir: string;
  ledgerFile: string;
  indexDir: string;
  indexBackend: IndexBackend;
  collection: string;
  queryTimeoutMs?: number;
  reconcileOnStart: boolean;
}

function parseBackend(value: string | undefined): IndexBackend {
  const v = value?.toLowerCase();
  if (v === 'postgres' || v === 'pg') return 'postgres';
  return 'local';
}

function parseTimeout(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): LedgerSettings {
  const dataDir = env.MY_FINANCE_MCP_DIR || join(homedir(), '.my_finance_mcp');
  return {
    dataDir,
    ledgerFile: join(dataDir, 'transactions.json'),
    indexDir: join(dataDir, 'financial_data'),
    indexBackend: parseBackend(env.MY_FINANCE_INDEX_BACKEND),
    collection: env.MY_FINANCE_COLLECTION || 'transactions',
    queryTimeoutMs: parseTimeout(env.MY_FINANCE_QUERY_TIMEOUT_MS),
    reconcileOnStart: env.MY_FINANCE_RECONCILE_ON_START?.toLowerCase() === 'true',
  };
}

export async function ensureDataDirs(settings: LedgerSettings): Promise<void> {
  await mkdir(settings.indexDir, { recursive: true });
}
