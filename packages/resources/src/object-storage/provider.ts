import type { BaseProvider, Logger } from '@quay/core';
import { ResourceError } from '../errors.js';
import type { ObjectStorageEntry } from './schemas.js';
import type { ObjectStorage } from './types.js';

/**
 * Object storage provider definition.
 *
 * Initialization runs in three stages, each failing with its own error code:
 * - `loadCredentials` → `resources_credentials_load_failed`
 * - `buildConfig` → `resources_provider_config_invalid`
 * - `connect` → `resources_connect_failed`
 *
 * Generics keep the stages consistent with each other; once defined the
 * provider is stored type-erased as an {@link ObjectStorageProviderHandle}.
 */
export interface ObjectStorageProviderDefinition<TCredentials, TConfig> {
    type: string;
    aliases?: readonly string[];
    loadCredentials(entry: ObjectStorageEntry): Promise<TCredentials>;
    buildConfig(entry: ObjectStorageEntry, credentials: TCredentials): TConfig;
    connect(name: string, config: TConfig, logger: Logger): Promise<ObjectStorage>;
}

export interface ObjectStorageProviderHandle extends BaseProvider {
    type: string;
    aliases?: readonly string[];
    /** Run every stage for one entry */
    create(entry: ObjectStorageEntry, logger: Logger): Promise<ObjectStorage>;
}

export function defineObjectStorageProvider<TCredentials, TConfig>(
    definition: ObjectStorageProviderDefinition<TCredentials, TConfig>
): ObjectStorageProviderHandle {
    return {
        type: definition.type,
        ...(definition.aliases && { aliases: definition.aliases }),
        async create(entry, logger) {
            let credentials: TCredentials;
            try {
                credentials = await definition.loadCredentials(entry);
            } catch (error) {
                throw ResourceError.fromStage('credentials', 'object_storage', entry.name, error);
            }

            let config: TConfig;
            try {
                config = definition.buildConfig(entry, credentials);
            } catch (error) {
                throw ResourceError.fromStage('config', 'object_storage', entry.name, error);
            }

            try {
                return await definition.connect(entry.name, config, logger);
            } catch (error) {
                throw ResourceError.fromStage('connect', 'object_storage', entry.name, error);
            }
        },
    };
}
