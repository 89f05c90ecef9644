import type { Logger, QuayRuntimeError } from '@quay/core';
import { LogComponent, withSpan, zodToIssues } from '@quay/core';
import { connectRedisCache } from '../cache/redis-cache.js';
import type { Cache, CacheConnector } from '../cache/types.js';
import { connectDatabase } from '../database/connect.js';
import type { Database } from '../database/database.js';
import { createDefaultDriverRegistry, type DatabaseDriverRegistry } from '../database/registry.js';
import { resolveDefaults } from '../defaults.js';
import type { AggregatedFailuresContext } from '../errors.js';
import { ResourceError } from '../errors.js';
import { createDefaultProviderRegistry } from '../object-storage/providers/index.js';
import type { ObjectStorageProviderRegistry } from '../object-storage/registry.js';
import { initObjectStorage } from '../object-storage/resolver.js';
import type { ObjectStorage } from '../object-storage/types.js';
import { ResourceConfigSchema } from '../schemas.js';
import type { ResourceFailure, ResourceFamily } from '../types.js';
import { ResourceRegistry, type FatalHandler } from './resource-registry.js';

export interface BringUpOptions {
    logger: Logger;
    /** Database drivers; defaults to the built-ins */
    drivers?: DatabaseDriverRegistry;
    /** Object storage providers; defaults to the built-ins */
    providers?: ObjectStorageProviderRegistry;
    /** Cache connector; defaults to Redis */
    connectCache?: CacheConnector;
    /** Passed to the registry for `mustGet*` misses */
    onFatal?: FatalHandler;
}

export interface BringUpResult {
    registry: ResourceRegistry;
    /** Every resource that failed, in config order per family */
    failures: ResourceFailure[];
    /** null when every resource came up */
    error: QuayRuntimeError<AggregatedFailuresContext> | null;
}

type UnitOutcome<T> = { ok: true; name: string; handle: T } | { ok: false; failure: ResourceFailure };

const SPAN_PREFIX: Record<ResourceFamily, string> = {
    database: 'database/connect',
    cache: 'cache/connect',
    object_storage: 'object_storage/init',
};

/**
 * Bring up every configured resource concurrently and build the registry.
 *
 * Config validation and defaulting run first and throw on failure; nothing is
 * started in that case. After that, each resource is an independent unit: a
 * failure is recorded against that resource only, and the registry holds
 * whatever did come up.
 *
 * @throws QuayValidationError when the config is invalid or defaults conflict
 */
export async function bringUp(rawConfig: unknown, options: BringUpOptions): Promise<BringUpResult> {
    const logger = options.logger.createChild(LogComponent.RESOURCES);

    const parsed = ResourceConfigSchema.safeParse(rawConfig ?? {});
    if (!parsed.success) {
        const error = ResourceError.configInvalid(zodToIssues(parsed.error));
        logger.error(`Invalid resource config: ${error.message}`, {
            issues: error.issues.map((issue) => `${issue.path?.join('.') ?? ''}: ${issue.message}`),
        });
        throw error;
    }
    const config = resolveDefaults(parsed.data, logger);

    const drivers = options.drivers ?? createDefaultDriverRegistry();
    const providers = options.providers ?? createDefaultProviderRegistry();
    const connectCache = options.connectCache ?? connectRedisCache;

    const total =
        config.database.databases.length +
        config.cache.instances.length +
        config.objectStorage.length;
    logger.info(`Bringing up ${total} resources`);

    // Every unit starts here, before anything is awaited
    const databaseUnits = config.database.databases.map((entry) =>
        runUnit('database', entry.name, logger, () =>
            connectDatabase(entry, { drivers, logger: logger.createChild(LogComponent.DATABASE) })
        )
    );
    const cacheUnits = config.cache.instances.map((instance) =>
        runUnit('cache', instance.name, logger, () =>
            connectCache(instance, config.cache, logger.createChild(LogComponent.CACHE))
        )
    );
    const objectStorageUnits = config.objectStorage.map((entry) =>
        runUnit('object_storage', entry.name, logger, () =>
            initObjectStorage(entry, {
                providers,
                logger: logger.createChild(LogComponent.OBJECT_STORAGE),
            })
        )
    );

    const [databases, caches, objectStorages] = await Promise.all([
        Promise.all(databaseUnits),
        Promise.all(cacheUnits),
        Promise.all(objectStorageUnits),
    ]);

    // Single collector: only this code writes to the maps, after every unit settled
    const failures: ResourceFailure[] = [];
    const registry = new ResourceRegistry(
        {
            database: collect<Database>(databases, failures),
            cache: collect<Cache>(caches, failures),
            object_storage: collect<ObjectStorage>(objectStorages, failures),
        },
        { logger: options.logger, ...(options.onFatal && { onFatal: options.onFatal }) }
    );

    if (failures.length === 0) {
        logger.info(`All ${total} resources are up`);
        return { registry, failures, error: null };
    }

    const error = ResourceError.bringUpIncomplete(failures, total);
    logger.warn(error.message, { failed: failures.length, total });
    return { registry, failures, error };
}

/**
 * Run one resource's connect in its own span. Never rejects.
 */
async function runUnit<T>(
    family: ResourceFamily,
    name: string,
    logger: Logger,
    connect: () => Promise<T>
): Promise<UnitOutcome<T>> {
    const startedAt = Date.now();
    try {
        const handle = await withSpan(`${SPAN_PREFIX[family]}/${name}`, () => connect(), {
            attributes: { 'resource.family': family, 'resource.name': name },
        });
        logger.info(`${family} ${name} is up`, { durationMs: Date.now() - startedAt });
        return { ok: true, name, handle };
    } catch (error) {
        const classified = ResourceError.fromStage('connect', family, name, error);
        logger.error(`${family} ${name} failed: ${classified.message}`, {
            code: classified.code,
            durationMs: Date.now() - startedAt,
        });
        return { ok: false, failure: { family, name, error: classified } };
    }
}

function collect<T>(outcomes: UnitOutcome<T>[], failures: ResourceFailure[]): Map<string, T> {
    const handles = new Map<string, T>();
    for (const outcome of outcomes) {
        if (outcome.ok) {
            handles.set(outcome.name, outcome.handle);
        } else {
            failures.push(outcome.failure);
        }
    }
    return handles;
}
