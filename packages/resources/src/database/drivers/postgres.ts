import { Pool } from 'pg';
import type { PoolClient } from 'pg';
import type { Logger } from '@quay/core';
import { errorMessage } from '@quay/core';
import type { ResolvedConnectionSpec } from '../../defaults.js';
import type { DatabaseDriver, DriverConnectOptions, SqlPool } from '../types.js';

/**
 * SqlPool backed by a pg Pool. `pool` exposes the native pool for callers that need it.
 */
export class PostgresPool implements SqlPool {
    constructor(readonly pool: Pool) {}

    async query<R extends Record<string, unknown> = Record<string, unknown>>(
        text: string,
        params: unknown[] = []
    ): Promise<{ rows: R[] }> {
        const result = await this.pool.query<R>(text, params);
        return { rows: result.rows };
    }

    end(): Promise<void> {
        return this.pool.end();
    }
}

async function warmUp(pool: Pool, count: number): Promise<void> {
    const clients: PoolClient[] = [];
    try {
        for (let i = 0; i < count; i++) {
            clients.push(await pool.connect());
        }
        await Promise.all(clients.map((client) => client.query('SELECT 1')));
    } finally {
        for (const client of clients) {
            client.release();
        }
    }
}

/**
 * PostgreSQL driver using the pg package.
 *
 * The pool is capped at `maxOpenConns`; `maxIdleConns` clients are opened and
 * verified up front and kept (idle timeout disabled). At least one client is
 * always verified so a bad DSN fails at bring-up rather than on first query.
 */
export const postgresDriver: DatabaseDriver = {
    type: 'postgres',
    aliases: ['postgresql', 'pg'],
    async connect(
        spec: ResolvedConnectionSpec,
        options: DriverConnectOptions,
        logger: Logger
    ): Promise<SqlPool> {
        const pool = new Pool({
            connectionString: spec.dsn,
            max: spec.maxOpenConns,
            idleTimeoutMillis: 0,
            connectionTimeoutMillis: options.connectTimeout,
            keepAlive: true,
        });

        // Pool-level errors come from idle clients; the pool replaces them on next acquire
        pool.on('error', (err) => {
            logger.warn(`PostgreSQL pool error on ${options.name} (${options.role}): ${err.message}`);
        });

        try {
            await warmUp(pool, Math.max(1, spec.maxIdleConns));
        } catch (error) {
            await pool.end().catch((endError: unknown) => {
                logger.debug(`Failed to end pool after warm-up failure: ${errorMessage(endError)}`);
            });
            throw error;
        }

        logger.debug(
            `PostgreSQL pool ready for ${options.name} (${options.role}): max=${spec.maxOpenConns}, idle=${spec.maxIdleConns}`
        );
        return new PostgresPool(pool);
    },
};
