import { BaseRegistry, type RegistryErrorFactory } from '@quay/core';
import { ResourceError } from '../errors.js';
import type { ObjectStorageProviderHandle } from './provider.js';

const providerErrorFactory: RegistryErrorFactory = {
    alreadyRegistered: (type: string) => ResourceError.providerAlreadyRegistered(type),
    notFound: (type: string, availableTypes: string[]) =>
        ResourceError.providerNotFound(type, availableTypes),
};

/**
 * Registry of object storage providers, matched case-insensitively by type or alias.
 */
export class ObjectStorageProviderRegistry extends BaseRegistry<ObjectStorageProviderHandle> {
    constructor() {
        super({ errorFactory: providerErrorFactory, caseInsensitive: true });
    }
}
