import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { createSearchIndex } from '../src/config/index-backend.js';
import { ensureDataDirs, loadSettings } from '../src/config/settings.js';
import { LocalSearchIndex } from '../src/search/local-search-index.js';
import { PgSearchIndex } from '../src/search/pg-search-index.js';

describe('loadSettings', () => {
  it('defaults to a directory under the home directory', () => {
    const settings = loadSettings({});

    expect(settings).toEqual({
      dataDir: join(homedir(), '.my_finance_mcp'),
      ledgerFile: join(homedir(), '.my_finance_mcp', 'transactions.json'),
      indexDir: join(homedir(), '.my_finance_mcp', 'financial_data'),
      indexBackend: 'local',
      collection: 'transactions',
      queryTimeoutMs: undefined,
      reconcileOnStart: false,
    });
  });

  it('honours overrides', () => {
    const settings = loadSettings({
      MY_FINANCE_MCP_DIR: '/srv/ledger',
      MY_FINANCE_INDEX_BACKEND: 'PG',
      MY_FINANCE_COLLECTION: 'household',
      MY_FINANCE_QUERY_TIMEOUT_MS: '2500',
      MY_FINANCE_RECONCILE_ON_START: 'TRUE',
    });

    expect(settings.ledgerFile).toBe('/srv/ledger/transactions.json');
    expect(settings.indexDir).toBe('/srv/ledger/financial_data');
    expect(settings.indexBackend).toBe('postgres');
    expect(settings.collection).toBe('household');
    expect(settings.queryTimeoutMs).toBe(2500);
    expect(settings.reconcileOnStart).toBe(true);
  });

  it('falls back to the local backend for unknown values', () => {
    expect(loadSettings({ MY_FINANCE_INDEX_BACKEND: 'chroma' }).indexBackend).toBe('local');
  });

  it('ignores a non-positive timeout', () => {
    expect(loadSettings({ MY_FINANCE_QUERY_TIMEOUT_MS: '-1' }).queryTimeoutMs).toBeUndefined();
    expect(loadSettings({ MY_FINANCE_QUERY_TIMEOUT_MS: 'soon' }).queryTimeoutMs).toBeUndefined();
  });
});

describe('ensureDataDirs and createSearchIndex', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('creates the index directory', async () => {
    dir = await mkdtemp(join(tmpdir(), 'settings-'));
    const settings = loadSettings({ MY_FINANCE_MCP_DIR: join(dir, 'nested') });

    await ensureDataDirs(settings);

    expect((await stat(settings.indexDir)).isDirectory()).toBe(true);
  });

  it('opens the backend named in the settings', async () => {
    const local = await createSearchIndex(loadSettings({ MY_FINANCE_MCP_DIR: '/unused' }));
    const pg = await createSearchIndex(loadSettings({ MY_FINANCE_INDEX_BACKEND: 'postgres' }));

    expect(local).toBeInstanceOf(LocalSearchIndex);
    expect(pg).toBeInstanceOf(PgSearchIndex);
  });
});
