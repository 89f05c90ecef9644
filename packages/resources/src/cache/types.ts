import type { Redis } from 'ioredis';
import type { Logger } from '@quay/core';
import type { Closable } from '../types.js';
import type { ResolvedCacheConfig } from '../defaults.js';
import type { CacheInstance } from './schemas.js';

/**
 * Connected cache instance
 */
export interface Cache extends Closable {
    readonly name: string;
    /** Hand out a connection from the instance's connection set */
    client(): Redis;
    ping(): Promise<void>;
}

/**
 * Opens one cache instance. Swappable so bring-up can run against other clients or fakes.
 */
export type CacheConnector = (
    instance: CacheInstance,
    config: ResolvedCacheConfig,
    logger: Logger
) => Promise<Cache>;
