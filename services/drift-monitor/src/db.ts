import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { log, type Logger } from './logger';

export type StoreResult = { rows: QueryResultRow[]; rowCount: number | null };

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<StoreResult>;
}

export interface StoreClient extends Queryable {
  release(err?: Error | boolean): void;
}

/** The connection handle threaded through the fetcher and the recorder. */
export interface Store extends Queryable {
  connect(): Promise<StoreClient>;
  end(): Promise<void>;
}

export type StoreOptions = {
  connectionString: string;
  connectTimeoutMs: number;
  statementTimeoutMs: number;
  logger?: Logger;
};

export function createStore({ connectionString, connectTimeoutMs, statementTimeoutMs, logger = log }: StoreOptions): Store {
  const pool = new pg.Pool({
    connectionString,
    connectionTimeoutMillis: connectTimeoutMs,
    statement_timeout: statementTimeoutMs,
    max: 2,
  });
  // idle clients can fail while nobody is waiting on them
  pool.on('error', (err) => logger.warn({ err }, 'idle store client error'));
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

export async function withTx<T>(store: Store, fn: (client: StoreClient) => Promise<T>, logger: Logger = log): Promise<T> {
  const client = await store.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const out = await fn(client);
    await client.query('COMMIT');
    return out;
  } catch (e) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      logger.error({ err: broken }, 'rollback failed');
    }
    throw e;
  } finally {
    client.release(broken);
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

/** Connectivity failures: the next scheduled cycle may well succeed. */
export function isTransientStoreError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('code' in err && typeof err.code === 'string') {
    // SQLSTATE class 08: connection exception
    if (TRANSIENT_CODES.has(err.code) || err.code.startsWith('08')) return true;
  }
  if (err instanceof AggregateError) return err.errors.some(isTransientStoreError);
  if (err instanceof Error) {
    return /timeout exceeded when trying to connect|connection terminated|connection timeout/i.test(err.message);
  }
  return false;
}
