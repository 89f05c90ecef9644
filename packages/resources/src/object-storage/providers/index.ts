import { ObjectStorageProviderRegistry } from '../registry.js';
import { gcsStorageProvider } from './gcs.js';
import { localStorageProvider } from './local.js';
import { digitalOceanStorageProvider, minioStorageProvider, s3StorageProvider } from './s3.js';

export {
    LocalObjectStore,
    createLocalStorageProvider,
    localStorageProvider,
    resolveBucketDir,
    type LocalStorageConfig,
} from './local.js';
export {
    GcsObjectStore,
    GcsServiceAccountKeySchema,
    gcsStorageProvider,
    type GcsServiceAccountKey,
    type GcsStorageConfig,
} from './gcs.js';
export {
    S3ObjectStore,
    buildS3Config,
    defineS3CompatibleProvider,
    digitalOceanStorageProvider,
    minioStorageProvider,
    s3StorageProvider,
    type S3Credentials,
    type S3StorageConfig,
} from './s3.js';

export const BUILT_IN_OBJECT_STORAGE_PROVIDERS = [
    localStorageProvider,
    gcsStorageProvider,
    s3StorageProvider,
    digitalOceanStorageProvider,
    minioStorageProvider,
] as const;

/**
 * Registry holding every built-in provider: local, gcs, s3, do, minio
 */
export function createDefaultProviderRegistry(): ObjectStorageProviderRegistry {
    const registry = new ObjectStorageProviderRegistry();
    for (const provider of BUILT_IN_OBJECT_STORAGE_PROVIDERS) {
        registry.register(provider);
    }
    return registry;
}
