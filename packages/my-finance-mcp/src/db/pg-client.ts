// PG client — connection pool for the ruvector-postgres search index backend
// Provides pool management, retrying queries and vector helpers

// pg is dynamically imported so it's only loaded when the postgres backend is selected
let _pool: import('pg').Pool | null = null;
let _pg: typeof import('pg') | null = null;

async function loadPg(): Promise<typeof import('pg')> {
  if (!_pg) {
    _pg = await import('pg');
  }
  return _pg;
}

export interface PgConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export function pgConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PgConfig {
  return {
    host: env.PG_HOST ?? 'localhost',
    port: Number(env.PG_PORT ?? 5433),
    user: env.PG_USER ?? 'finance',
    password: env.PG_PASSWORD ?? '',
    database: env.PG_DATABASE ?? 'my_finance',
    poolMax: Number(env.PG_POOL_MAX ?? 5),
    idleTimeoutMs: Number(env.PG_IDLE_TIMEOUT_MS ?? 30_000),
    connectionTimeoutMs: Number(env.PG_CONNECTION_TIMEOUT_MS ?? 5_000),
  };
}

/**
 * Returns the shared pg.Pool, creating it on first call.
 */
export async function getPool(config?: PgConfig): Promise<import('pg').Pool> {
  if (_pool) return _pool;

  const pg = await loadPg();
  const c = config ?? pgConfigFromEnv();

  const pool = new pg.default.Pool({
    host: c.host,
    port: c.port,
    user: c.user,
    password: c.password,
    database: c.database,
    max: c.poolMax,
    idleTimeoutMillis: c.idleTimeoutMs,
    connectionTimeoutMillis: c.connectionTimeoutMs,
    statement_timeout: 30_000,
    application_name: 'my-finance-mcp',
  });

  // Never crash the process on idle-client errors
  pool.on('error', (err) => {
    console.warn('[pg-client] pool background error, resetting pool:', err.message);
    resetPool().catch((resetErr: Error) => {
      console.warn('[pg-client] pool reset failed:', resetErr.message);
    });
  });

  pool.on('connect', (client) => {
    client.query('SET ruvector.ef_search = 100').catch((err: Error) => {
      console.warn('[pg-client] failed to SET ruvector.ef_search:', err.message);
    });
  });

  _pool = pool;
  return pool;
}

/**
 * Drop the current pool so getPool() builds a fresh one on the next call.
 */
export async function resetPool(): Promise<void> {
  const pool = _pool;
  _pool = null;
  if (!pool) return;
  try {
    await pool.end();
  } catch (err) {
    console.warn('[pg-client] ending broken pool:', err instanceof Error ? err.message : String(err));
  }
}

const RECOVERABLE = [
  'Connection terminated',
  'recovery mode',
  'the database system is starting up',
  'connection refused',
  'terminating connection',
];

/**
 * Execute a query, retrying on connection and recovery errors.
 * Exponential backoff: base delay * 3^attempt (1s → 3s → 9s by default).
 */
export async function queryWithRetry<T extends import('pg').QueryResultRow>(
  queryText: string,
  params: unknown[],
  maxRetries = Number(process.env.PG_RETRY_MAX ?? 2),
  retryDelayMs = Number(process.env.PG_RETRY_DELAY_MS ?? 1000),
): Promise<import('pg').QueryResult<T>> {
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const pool = await getPool();
      return await pool.query<T>(queryText, params);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      const isRecoverable = RECOVERABLE.some(s => msg.includes(s));

      if (attempt < maxRetries && isRecoverable) {
        const delay = retryDelayMs * Math.pow(3, attempt);
        console.warn(
          `[pg-client] queryWithRetry attempt ${attempt + 1}/${maxRetries} failed: ${msg}. ` +
          `Retrying in ${delay}ms...`,
        );
        await resetPool();
        await new Promise(r => setTimeout(r, delay));
        continue;
      }

      console.error(`[pg-client] queryWithRetry failed after ${attempt + 1} attempt(s): ${msg}`);
      throw err;
    }
  }
  throw new Error('queryWithRetry: exhausted retries');
}

/**
 * Convert a Float32Array to a ruvector literal string: `[0.1,0.2,...]`
 */
export function float32ToVectorLiteral(vec: Float32Array): string {
  const parts: string[] = [];
  for (let i = 0; i < vec.length; i++) {
    parts.push(vec[i].toFixed(6));
  }
  return `[${parts.join(',')}]`;
}
