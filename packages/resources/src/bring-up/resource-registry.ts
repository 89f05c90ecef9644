import type { Logger, QuayRuntimeError } from '@quay/core';
import { LogComponent } from '@quay/core';
import type { Cache } from '../cache/types.js';
import type { Database } from '../database/database.js';
import type { AggregatedFailuresContext, ResourceErrorContext } from '../errors.js';
import { ResourceError } from '../errors.js';
import type { ObjectStorage } from '../object-storage/types.js';
import type { ResourceFamily } from '../types.js';
import { closeAll } from './lifecycle.js';

/**
 * Handle type held for each family
 */
export interface ResourceHandles {
    database: Database;
    cache: Cache;
    object_storage: ObjectStorage;
}

export type ResourceMaps = {
    [F in ResourceFamily]: ReadonlyMap<string, ResourceHandles[F]>;
};

export type LookupResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: QuayRuntimeError<ResourceErrorContext> };

/**
 * Called when a `mustGet*` lookup misses. Never returns.
 */
export type FatalHandler = (error: Error) => never;

export const exitOnFatal: FatalHandler = () => process.exit(1);

export interface ResourceRegistryOptions {
    logger: Logger;
    onFatal?: FatalHandler;
}

/**
 * Name → handle maps for every family. Built once after bring-up; read-only afterwards.
 */
export class ResourceRegistry {
    private readonly maps: ResourceMaps;
    private readonly logger: Logger;
    private readonly onFatal: FatalHandler;

    constructor(maps: ResourceMaps, options: ResourceRegistryOptions) {
        this.maps = maps;
        this.logger = options.logger;
        this.onFatal = options.onFatal ?? exitOnFatal;
    }

    static empty(options: ResourceRegistryOptions): ResourceRegistry {
        return new ResourceRegistry(
            { database: new Map(), cache: new Map(), object_storage: new Map() },
            options
        );
    }

    get<F extends ResourceFamily>(family: F, name: string): LookupResult<ResourceHandles[F]> {
        const handle = this.maps[family].get(name);
        if (handle === undefined) {
            return { ok: false, error: ResourceError.notFound(family, name) };
        }
        return { ok: true, value: handle };
    }

    /**
     * Lookup that treats a miss as fatal: logs, then hands over to `onFatal`
     */
    mustGet<F extends ResourceFamily>(family: F, name: string): ResourceHandles[F] {
        const result = this.get(family, name);
        if (result.ok) {
            return result.value;
        }
        this.logger.error(result.error.message, { family, name, code: result.error.code });
        return this.onFatal(result.error);
    }

    getDatabase(name: string): LookupResult<Database> {
        return this.get('database', name);
    }

    getCache(name: string): LookupResult<Cache> {
        return this.get('cache', name);
    }

    getObjectStorage(name: string): LookupResult<ObjectStorage> {
        return this.get('object_storage', name);
    }

    mustGetDatabase(name: string): Database {
        return this.mustGet('database', name);
    }

    mustGetCache(name: string): Cache {
        return this.mustGet('cache', name);
    }

    mustGetObjectStorage(name: string): ObjectStorage {
        return this.mustGet('object_storage', name);
    }

    names(family: ResourceFamily): string[] {
        return Array.from(this.maps[family].keys()).sort();
    }

    entries<F extends ResourceFamily>(family: F): Array<[string, ResourceHandles[F]]> {
        return Array.from(this.maps[family].entries());
    }

    get size(): number {
        return this.maps.database.size + this.maps.cache.size + this.maps.object_storage.size;
    }

    /**
     * Close every held resource. See {@link closeAll}.
     */
    closeAll(): Promise<QuayRuntimeError<AggregatedFailuresContext> | null> {
        return closeAll(this, this.logger.createChild(LogComponent.LIFECYCLE));
    }
}
