import pg from 'pg';
import { AppError, StorageError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const { Pool } = pg;

const log = createLogger('Database');

export interface Queryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<R>>;
}

export interface PoolClientLike extends Queryable {
  release(): void;
}

export interface PoolLike extends Queryable {
  connect(): Promise<PoolClientLike>;
  end(): Promise<void>;
}

function normalizeFlag(value: string | undefined): string {
  return value ? value.toLowerCase().trim() : '';
}

function resolveSsl(): pg.ConnectionConfig['ssl'] {
  const mode = normalizeFlag(process.env.DATABASE_SSL);
  if (['require', 'true', '1', 'on'].includes(mode)) {
    return { rejectUnauthorized: normalizeFlag(process.env.DATABASE_SSL_REJECT_UNAUTHORIZED) !== 'false' };
  }
  return false;
}

const debugSql = () => normalizeFlag(process.env.DEBUG_SQL) === 'true';

let pool: PoolLike | null = null;

function createPool(): PoolLike {
  const created = new Pool({
    connectionString: process.env.DATABASE_URL,
    ssl: resolveSsl(),
    max: Number.parseInt(process.env.DATABASE_POOL_MAX ?? '5', 10)
  });

  created.on('error', (err: Error) => {
    log.error('Unexpected error on idle client', err);
    process.exit(-1);
  });

  return created;
}

function getPool(): PoolLike {
  pool ??= createPool();
  return pool;
}

function toStorageError(error: unknown, action: string): unknown {
  if (error instanceof AppError) {
    return error;
  }
  return new StorageError(`${action} failed: ${describeError(error)}`, error);
}

/**
 * Execute a single SQL statement on the shared pool.
 */
export async function query<R extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<R>> {
  const start = Date.now();
  try {
    const res = await getPool().query<R>(text, params);
    if (debugSql()) {
      log.debug('Executed query', {
        statement: text.replace(/\s+/g, ' ').trim().slice(0, 200),
        duration: Date.now() - start,
        rows: res.rowCount
      });
    }
    return res;
  } catch (error) {
    throw toStorageError(error, 'Query');
  }
}

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * whole unit back, so readers never see a partial multi-row edit.
 */
export async function withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
  let client: PoolClientLike;
  try {
    client = await getPool().connect();
  } catch (error) {
    throw toStorageError(error, 'Connect');
  }

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      log.error('Rollback failed', rollbackError);
    }
    throw toStorageError(error, 'Transaction');
  } finally {
    client.release();
  }
}

export async function end(): Promise<void> {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
}

/** Swap the pool for an in-process stand-in; returns a restore callback. */
export function __setPoolForTests(replacement: PoolLike): () => void {
  const previous = pool;
  pool = replacement;
  return () => {
    pool = previous;
  };
}

export default { query, withTransaction, end };
