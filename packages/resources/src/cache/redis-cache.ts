import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { Logger } from '@quay/core';
import { errorMessage } from '@quay/core';
import type { ResolvedCacheConfig } from '../defaults.js';
import { ResourceError } from '../errors.js';
import type { Cache, CacheConnector } from './types.js';
import type { CacheInstance } from './schemas.js';

export interface RedisCacheOptions {
    maxActive: number;
    maxIdle: number;
    /** Connect and command timeout in ms */
    timeout: number;
}

/**
 * Accepts `host:port` or a `redis://` / `rediss://` URL
 */
export function toRedisURL(address: string): string {
    return /^rediss?:\/\//i.test(address) ? address : `redis://${address}`;
}

/**
 * Set of Redis connections to one instance.
 *
 * `maxIdle` connections are opened by `connect()`. `client()` hands them out
 * round-robin and opens another (up to `maxActive`) when the one in turn is not ready.
 */
export class RedisCache implements Cache {
    private readonly connections: Redis[] = [];
    private readonly url: string;
    private cursor = 0;
    private closing: Promise<void> | null = null;

    constructor(
        readonly name: string,
        address: string,
        private readonly options: RedisCacheOptions,
        private readonly logger: Logger
    ) {
        this.url = toRedisURL(address);
    }

    get size(): number {
        return this.connections.length;
    }

    /**
     * Open `maxIdle` connections. On failure the caller is expected to close().
     */
    async connect(): Promise<void> {
        const opened = await Promise.allSettled(
            Array.from({ length: this.options.maxIdle }, async () => {
                const connection = this.open();
                await connection.connect();
                return connection;
            })
        );

        for (const result of opened) {
            if (result.status === 'fulfilled') {
                this.connections.push(result.value);
            }
        }

        const failed = opened.find(
            (result): result is PromiseRejectedResult => result.status === 'rejected'
        );
        // Connections that did open stay in the set so close() releases them
        if (failed) {
            throw failed.reason;
        }
    }

    /**
     * @throws QuayRuntimeError `resources_closed` once close() has been called
     */
    client(): Redis {
        if (this.closing) {
            throw ResourceError.closed('cache', this.name);
        }
        const current = this.connections[this.cursor % Math.max(1, this.connections.length)];
        this.cursor++;

        if (current && current.status === 'ready') {
            return current;
        }
        if (this.connections.length < this.options.maxActive) {
            const connection = this.open({ lazyConnect: false });
            this.connections.push(connection);
            return connection;
        }
        if (current) {
            return current;
        }
        throw ResourceError.connectFailed('cache', this.name, new Error('No connections available'));
    }

    async ping(): Promise<void> {
        await Promise.all(this.connections.map((connection) => connection.ping()));
    }

    close(): Promise<void> {
        this.closing ??= this.quitAll();
        return this.closing;
    }

    private async quitAll(): Promise<void> {
        const results = await Promise.allSettled(
            this.connections.map((connection) => connection.quit())
        );
        const rejected = results.find(
            (result): result is PromiseRejectedResult => result.status === 'rejected'
        );
        if (rejected) {
            throw rejected.reason;
        }
    }

    private open(overrides: Partial<RedisOptions> = {}): Redis {
        const connection = new Redis(this.url, {
            lazyConnect: true,
            connectTimeout: this.options.timeout,
            commandTimeout: this.options.timeout,
            maxRetriesPerRequest: 3,
            ...overrides,
        });

        connection.on('error', (error: Error) => {
            this.logger.warn(`Redis connection error on ${this.name}: ${error.message}`);
        });

        return connection;
    }
}

/**
 * Default cache connector: opens a RedisCache and verifies it with PING
 *
 * @throws QuayRuntimeError `resources_connect_failed`
 */
export const connectRedisCache: CacheConnector = async (
    instance: CacheInstance,
    config: ResolvedCacheConfig,
    logger: Logger
) => {
    const cache = new RedisCache(
        instance.name,
        instance.address,
        { maxActive: config.maxActive, maxIdle: config.maxIdle, timeout: config.timeout },
        logger
    );

    try {
        await cache.connect();
        await cache.ping();
    } catch (error) {
        await cache.close().catch((closeError: unknown) => {
            logger.debug(`Failed to close redis ${instance.name} after connect failure: ${errorMessage(closeError)}`);
        });
        throw ResourceError.connectFailed('cache', instance.name, error, {
            address: instance.address,
        });
    }

    logger.debug(`Redis ${instance.name} ready with ${cache.size} connections`);
    return cache;
};
