import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '@quay/core';
import { errorMessage } from '@quay/core';
import type { ResolvedConnectionSpec, ResolvedDatabaseEntry } from '../defaults.js';
import { ResourceError } from '../errors.js';
import { Database } from './database.js';
import type { DatabaseDriverRegistry } from './registry.js';
import type { ConnectionRole, DatabaseDriver, SqlPool } from './types.js';

export interface ConnectDatabaseOptions {
    drivers: DatabaseDriverRegistry;
    logger: Logger;
}

/**
 * Open the leader, then the follower when a replica DSN is configured.
 * A follower failure closes the already-open leader before rethrowing.
 *
 * @throws QuayRuntimeError `resources_driver_not_found` or `resources_connect_failed`
 */
export async function connectDatabase(
    entry: ResolvedDatabaseEntry,
    options: ConnectDatabaseOptions
): Promise<Database> {
    const { logger } = options;
    const driver = options.drivers.resolve(entry.driver);

    const leader = await connectWithRetry(driver, entry, entry.leader, 'leader', logger);
    if (!entry.replica) {
        return new Database(entry.name, driver.type, leader, leader);
    }

    let follower: SqlPool;
    try {
        follower = await connectWithRetry(driver, entry, entry.replica, 'follower', logger);
    } catch (error) {
        await leader.end().catch((endError: unknown) => {
            logger.warn(`Failed to close leader of ${entry.name} after follower failure: ${errorMessage(endError)}`);
        });
        throw error;
    }
    return new Database(entry.name, driver.type, leader, follower);
}

/**
 * One attempt plus `maxRetry` retries, `retryInterval` ms apart
 */
async function connectWithRetry(
    driver: DatabaseDriver,
    entry: ResolvedDatabaseEntry,
    spec: ResolvedConnectionSpec,
    role: ConnectionRole,
    logger: Logger
): Promise<SqlPool> {
    const attempts = spec.maxRetry + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
            return await driver.connect(
                spec,
                { name: entry.name, role, connectTimeout: entry.connectTimeout },
                logger
            );
        } catch (error) {
            lastError = error;
            logger.warn(
                `Connect attempt ${attempt}/${attempts} for ${entry.name} (${role}) failed: ${errorMessage(error)}`
            );
            if (attempt < attempts) {
                await sleep(entry.retryInterval);
            }
        }
    }

    throw ResourceError.connectFailed('database', entry.name, lastError, { role, attempts });
}
