import { z } from 'zod';
import { DatabaseConfigSchema } from './database/schemas.js';
import { CacheConfigSchema } from './cache/schemas.js';
import { ObjectStorageConfigSchema } from './object-storage/schemas.js';

export {
    DatabaseConfigSchema,
    DatabaseEntrySchema,
    LeaderConnectionSchema,
    ReplicaConnectionSchema,
    type ConnectionSpec,
    type DatabaseConfig,
    type DatabaseConfigInput,
    type DatabaseEntry,
} from './database/schemas.js';
export {
    CacheConfigSchema,
    CacheInstanceSchema,
    type CacheConfig,
    type CacheConfigInput,
    type CacheInstance,
} from './cache/schemas.js';
export {
    ObjectStorageConfigSchema,
    ObjectStorageEntrySchema,
    type ObjectStorageEntry,
    type ObjectStorageEntryInput,
} from './object-storage/schemas.js';

/**
 * Top-level resource configuration.
 * Section names match the config file (`database`, `redis`, `object_storage`).
 */
export const ResourceConfigSchema = z
    .object({
        database: DatabaseConfigSchema.default({}),
        redis: CacheConfigSchema.default({}),
        object_storage: ObjectStorageConfigSchema,
    })
    .strict()
    .describe('Resources to bring up: databases, redis caches and object storage')
    .transform((config) => ({
        database: config.database,
        cache: config.redis,
        objectStorage: config.object_storage,
    }));

export type ResourceConfigInput = z.input<typeof ResourceConfigSchema>;
export type ResourceConfig = z.output<typeof ResourceConfigSchema>;
