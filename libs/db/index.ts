import type { QueryResult, QueryResultRow } from 'pg';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';

export type Queryable = {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
};

export type TxClient = Queryable;

/**
 * Subset of pg.PoolClient the facade relies on.
 */
export interface PooledClient extends Queryable {
    release(err?: Error | boolean): void;
}

/**
 * Subset of pg.Pool the facade relies on.
 */
export interface ClientPool {
    connect(): Promise<PooledClient>;
}

export interface Db {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
    transaction<T>(callback: (client: TxClient) => Promise<T>): Promise<T>;
}

function releaseClient(client: PooledClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

/**
 * Fail-safe transaction wrapper around a pool.
 * Callback errors roll back and propagate unchanged so the caller still sees
 * domain errors; driver errors are sanitized.
 */
export function createDb(pool: ClientPool): Db {
    return {
        query: async <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => {
            const client = await pool.connect();
            try {
                return await client.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryFailure');
            } finally {
                releaseClient(client, false, 'query');
            }
        },

        transaction: async <T>(callback: (client: TxClient) => Promise<T>): Promise<T> => {
            const client = await pool.connect();
            let forceDestroy = false;
            try {
                await client.query('BEGIN');
            } catch (error) {
                releaseClient(client, true, 'transaction:begin');
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:BeginFailed');
            }

            let result: T;
            try {
                result = await callback(client);
            } catch (error) {
                try {
                    await client.query('ROLLBACK');
                } catch (rollbackError) {
                    forceDestroy = true;
                    logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
                }
                releaseClient(client, forceDestroy, 'transaction:rollback');
                throw error;
            }

            try {
                await client.query('COMMIT');
            } catch (error) {
                releaseClient(client, true, 'transaction:commit');
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:CommitFailed');
            }

            releaseClient(client, false, 'transaction');
            return result;
        }
    };
}
