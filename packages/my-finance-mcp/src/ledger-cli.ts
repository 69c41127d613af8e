#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { loadSettings } from './config/settings.js';
import { LedgerSession } from './session.js';

// ── ANSI helpers ────────────────────────────────────────────────────
const isTTY = process.stdout.isTTY ?? false;
const ansi = {
  reset: isTTY ? '\x1b[0m' : '', bold: isTTY ? '\x1b[1m' : '', dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '', green: isTTY ? '\x1b[32m' : '', red: isTTY ? '\x1b[31m' : '',
};
function c(color: keyof typeof ansi, text: string): string { return `${ansi[color]}${text}${ansi.reset}`; }

// ── Arg parsing ─────────────────────────────────────────────────────
const args = process.argv.slice(2);
const command = args[0]?.toLowerCase();

function getFlag(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function positional(): string[] {
  const out: string[] = [];
  for (let i = 1; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (['--limit', '--offset', '--category'].includes(args[i])) i++;
      continue;
    }
    out.push(args[i]);
  }
  return out;
}

function padL(s: string, n: number): string { return s.length >= n ? s : ' '.repeat(n - s.length) + s; }
function padR(s: string, n: number): string { return s.length >= n ? s : s + ' '.repeat(n - s.length); }

// ── Handlers ────────────────────────────────────────────────────────

async function handleList(session: LedgerSession) {
  const page = await session.list({
    limit: Number(getFlag('--limit') ?? 20),
    offset: Number(getFlag('--offset') ?? 0),
    category: getFlag('--category'),
  });
  if (page.total === 0) { console.log('No transactions stored'); return; }
  console.log(`\n  ${c('bold', 'Transactions')} ${c('dim', `(${page.offset + 1}-${page.offset + page.transactions.length} of ${page.total})`)}\n`);
  for (const t of page.transactions) {
    const amount = t.amount.toFixed(2);
    console.log(`  ${c('dim', padL(String(t.index), 5))}  ${padR(t.date, 10)}  ${c(t.amount < 0 ? 'red' : 'green', padL(amount, 12))}  ${padR(t.category, 14)}  ${t.description}`);
  }
  if (page.hasMore) console.log(`\n  ${c('dim', `more: --offset ${page.offset + page.limit}`)}`);
  console.log();
}

async function handleQuery(session: LedgerSession) {
  const text = positional().join(' ');
  if (!text) { console.error(`${c('red', 'Error:')} <query> is required`); process.exit(1); }
  console.log(await session.query(text));
}

async function handleStore(session: LedgerSession) {
  const file = positional()[0];
  if (!file) { console.error(`${c('red', 'Error:')} <file.json> is required`); process.exit(1); }
  const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
  let batch: unknown[];
  if (Array.isArray(parsed)) {
    batch = parsed;
  } else if (typeof parsed === 'object' && parsed !== null && 'transactions' in parsed && Array.isArray(parsed.transactions)) {
    batch = parsed.transactions;
  } else {
    console.error(`${c('red', 'Error:')} ${file} must hold an array of transactions`);
    process.exit(1);
  }
  const count = await session.store(batch);
  console.log(`  ${c('green', '✓')} Stored ${count} transactions successfully`);
}

async function handleDelete(session: LedgerSession) {
  const indices = positional().map(Number).filter(n => Number.isInteger(n) && n >= 0);
  const message = await session.delete({
    indices,
    deleteAll: hasFlag('--all'),
    confirm: hasFlag('--confirm'),
  });
  console.log(`  ${message}`);
}

async function handleReconcile(session: LedgerSession) {
  const { reinserted, removed } = await session.reconcile();
  console.log(`  ${c('green', '✓')} Reconciled index: ${reinserted} re-inserted, ${removed} removed.`);
}

function printHelp() {
  console.log(`
  ${c('bold', 'my-finance')} ${c('dim', '-- transaction ledger with semantic search')}

  ${c('cyan', 'Usage:')}  my-finance <command> [args] [options]

  ${c('cyan', 'Commands:')}
    ${c('bold', 'list')}                              Stored transactions with their index
        ${c('dim', '[--limit N] [--offset N] [--category X]')}
    ${c('bold', 'query')} <text>                      Semantic search with totals
    ${c('bold', 'store')} <file.json>                 Store transactions from a JSON file
    ${c('bold', 'delete')} <index...> --confirm       Delete by index (from list)
    ${c('bold', 'delete')} --all --confirm            Delete everything
    ${c('bold', 'reconcile')}                         Repair ledger/index drift
    ${c('bold', '--help')}                            Show this help

  ${c('cyan', 'Examples:')}
    ${c('dim', 'my-finance list --category food')}
    ${c('dim', 'my-finance query "coffee last month"')}
    ${c('dim', 'my-finance delete 3 7 --confirm')}

  ${c('dim', 'Data lives in MY_FINANCE_MCP_DIR (default ~/.my_finance_mcp).')}
`);
}

// ── Main ────────────────────────────────────────────────────────────
async function main() {
  if (!command || command === '--help' || command === '-h' || command === 'help') { printHelp(); return; }
  try {
    const session = await LedgerSession.open(loadSettings());
    switch (command) {
      case 'list':      await handleList(session); break;
      case 'query':     await handleQuery(session); break;
      case 'store':     await handleStore(session); break;
      case 'delete':    await handleDelete(session); break;
      case 'reconcile': await handleReconcile(session); break;
      default:
        console.error(`${c('red', 'Error:')} Unknown command "${command}"\n`);
        printHelp(); process.exit(1);
    }
  } catch (err) {
    console.error(`${c('red', 'Error:')} ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

await main();
