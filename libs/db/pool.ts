import pg from 'pg';
import type { Pool as PgPool, QueryResultRow } from 'pg';
import { DatabaseConfig } from '../bootstrap/config/registry-config.js';
import type { ClientPool, PooledClient } from './index.js';

const { Pool } = pg;

/**
 * PostgreSQL connection pool for the registry ledger.
 * TLS is mandatory whenever a CA certificate is configured.
 */
export function createPool(config: DatabaseConfig): PgPool {
    return new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.caCert
            ? {
                rejectUnauthorized: true,
                ca: config.caCert,
            }
            : false
    });
}

/**
 * Narrows a pg pool to the ClientPool surface createDb() consumes.
 */
export function asClientPool(pool: PgPool): ClientPool {
    return {
        connect: async (): Promise<PooledClient> => {
            const client = await pool.connect();
            return {
                query: <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<T>(text, params),
                release: (err?: Error | boolean) => client.release(err)
            };
        }
    };
}
