import { BaseRegistry, type RegistryErrorFactory } from '@quay/core';
import { ResourceError } from '../errors.js';
import type { DatabaseDriver } from './types.js';
import { postgresDriver } from './drivers/postgres.js';

const driverErrorFactory: RegistryErrorFactory = {
    alreadyRegistered: (type: string) => ResourceError.driverAlreadyRegistered(type),
    notFound: (type: string, availableTypes: string[]) =>
        ResourceError.driverNotFound(type, availableTypes),
};

/**
 * Registry of database drivers, matched case-insensitively by type or alias.
 */
export class DatabaseDriverRegistry extends BaseRegistry<DatabaseDriver> {
    constructor() {
        super({ errorFactory: driverErrorFactory, caseInsensitive: true });
    }
}

/**
 * Registry holding the built-in drivers (postgres).
 * A fresh instance per call so tests and embedders can add drivers without sharing state.
 */
export function createDefaultDriverRegistry(): DatabaseDriverRegistry {
    const registry = new DatabaseDriverRegistry();
    registry.register(postgresDriver);
    return registry;
}
