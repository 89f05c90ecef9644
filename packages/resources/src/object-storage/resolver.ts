import type { Logger } from '@quay/core';
import type { ObjectStorageEntry } from './schemas.js';
import type { ObjectStorageProviderRegistry } from './registry.js';
import type { ObjectStorage } from './types.js';

export interface InitObjectStorageOptions {
    providers: ObjectStorageProviderRegistry;
    logger: Logger;
}

/**
 * Resolve the entry's provider and run its stages.
 *
 * @throws QuayRuntimeError `resources_provider_not_found` or a stage error
 */
export async function initObjectStorage(
    entry: ObjectStorageEntry,
    options: InitObjectStorageOptions
): Promise<ObjectStorage> {
    const provider = options.providers.resolve(entry.provider);
    options.logger.debug(`Initializing object storage ${entry.name} with provider ${provider.type}`);
    return provider.create(entry, options.logger);
}
