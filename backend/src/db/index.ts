import { Pool, PoolClient, PoolConfig, QueryResult } from 'pg';
import { config } from '../config';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export function getPool(): Pool {
    if (!pool) {
        const poolConfig: PoolConfig = {
            connectionString: config.databaseUrl,
            max: config.dbPoolMax,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
            // Bounds every store call so a stalled database surfaces as a server error
            statement_timeout: config.dbQueryTimeoutMs,
            query_timeout: config.dbQueryTimeoutMs,
        };
        pool = new Pool(poolConfig);
        pool.on('error', (err) => {
            logger.error({ err }, 'Unexpected database pool error');
        });
    }
    return pool;
}

async function run(text: string, params: unknown[] | undefined, label: string): Promise<QueryResult> {
    const start = Date.now();
    const result = await getPool().query(text, params);
    logger.debug({ query: text.slice(0, 100), duration: Date.now() - start, rows: result.rowCount }, label);
    return result;
}

export async function query<T = Record<string, unknown>>(
    text: string,
    params?: unknown[]
): Promise<T[]> {
    const result = await run(text, params, 'DB query');
    return result.rows as T[];
}

export async function queryOne<T = Record<string, unknown>>(
    text: string,
    params?: unknown[]
): Promise<T | null> {
    const rows = await query<T>(text, params);
    return rows[0] ?? null;
}

/** Run a write statement and return the number of rows it touched. */
export async function execute(text: string, params?: unknown[]): Promise<number> {
    const result = await run(text, params, 'DB execute');
    return result.rowCount ?? 0;
}

/** Statements bound to one connection inside `transaction`. */
export interface Transaction {
    execute(text: string, params?: unknown[]): Promise<number>;
}

function bind(client: PoolClient): Transaction {
    return {
        async execute(text: string, params?: unknown[]): Promise<number> {
            const result = await client.query(text, params);
            return result.rowCount ?? 0;
        },
    };
}

/**
 * Run `fn` inside BEGIN/COMMIT on a single pooled connection; any throw rolls
 * back. Row locks taken by an UPDATE are held until the commit.
 */
export async function transaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const client = await getPool().connect();
    try {
        await client.query('BEGIN');
        const result = await fn(bind(client));
        await client.query('COMMIT');
        return result;
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    } finally {
        client.release();
    }
}

export async function closePool(): Promise<void> {
    if (pool) {
        await pool.end();
        pool = null;
    }
}
