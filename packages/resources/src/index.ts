/**
 * @quay/resources
 *
 * Brings up databases, caches and object storage from one config, concurrently,
 * and hands back a name-keyed registry plus everything that failed.
 */

export * from './error-codes.js';
export * from './errors.js';
export * from './types.js';
export * from './schemas.js';
export * from './defaults.js';
export { loadResourceConfig } from './loader.js';

export type { ConnectionRole, DatabaseDriver, DriverConnectOptions, SqlPool } from './database/types.js';
export { Database } from './database/database.js';
export { connectDatabase, type ConnectDatabaseOptions } from './database/connect.js';
export { DatabaseDriverRegistry, createDefaultDriverRegistry } from './database/registry.js';
export { PostgresPool, postgresDriver } from './database/drivers/postgres.js';

export type { Cache, CacheConnector } from './cache/types.js';
export { RedisCache, connectRedisCache, toRedisURL, type RedisCacheOptions } from './cache/redis-cache.js';

export type {
    BucketAddress,
    ObjectBody,
    ObjectStorage,
    PutObjectOptions,
} from './object-storage/types.js';
export {
    defineObjectStorageProvider,
    type ObjectStorageProviderDefinition,
    type ObjectStorageProviderHandle,
} from './object-storage/provider.js';
export { ObjectStorageProviderRegistry } from './object-storage/registry.js';
export { initObjectStorage, type InitObjectStorageOptions } from './object-storage/resolver.js';
export { buildObjectURL, validateObjectKey } from './object-storage/object-utils.js';
export * from './object-storage/providers/index.js';

export {
    ResourceRegistry,
    exitOnFatal,
    type FatalHandler,
    type LookupResult,
    type ResourceHandles,
    type ResourceMaps,
    type ResourceRegistryOptions,
} from './bring-up/resource-registry.js';
export { CLOSE_ORDER, closeAll } from './bring-up/lifecycle.js';
export { bringUp, type BringUpOptions, type BringUpResult } from './bring-up/initializer.js';
