import pg from 'pg';
import { logger } from '../logging/logger.js';
import type { DbConfig } from '../config/appConfig.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type DbHandle = Queryable & {
    close(): Promise<void>;
};

/**
 * PostgreSQL connection pool for the document store.
 * All values come from validated configuration; there are no inline fallbacks.
 */
export function createDbHandle(config: DbConfig): DbHandle {
    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl
            ? {
                rejectUnauthorized: true,
                ca: config.caCert,
            }
            : false
    });

    pool.on('error', (error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return {
        query: <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
            pool.query<T>(text, params),
        close: async () => {
            await pool.end();
            logger.info('[DB] Pool closed');
        }
    };
}
