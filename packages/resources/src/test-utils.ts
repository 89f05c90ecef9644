/**
 * In-process stand-ins for drivers, caches and object storage used by tests
 */

import { vi } from 'vitest';
import type { Redis } from 'ioredis';
import type { Cache, CacheConnector } from './cache/types.js';
import type { DatabaseDriver, SqlPool } from './database/types.js';
import { defineObjectStorageProvider, type ObjectStorageProviderHandle } from './object-storage/provider.js';
import type { ObjectBody, ObjectStorage } from './object-storage/types.js';
import { ResourceError } from './errors.js';

/**
 * Counts connects in progress and remembers the highest count seen
 */
export class InFlightTracker {
    current = 0;
    peak = 0;

    async run<T>(work: () => Promise<T>): Promise<T> {
        this.current++;
        this.peak = Math.max(this.peak, this.current);
        try {
            return await work();
        } finally {
            this.current--;
        }
    }
}

export class FakeSqlPool implements SqlPool {
    endCalls = 0;

    constructor(
        readonly dsn: string,
        private readonly endError?: Error
    ) {}

    async query<R extends Record<string, unknown> = Record<string, unknown>>(): Promise<{ rows: R[] }> {
        return { rows: [] };
    }

    async end(): Promise<void> {
        this.endCalls++;
        if (this.endError) {
            throw this.endError;
        }
    }
}

export interface FakeDriverOptions {
    type?: string;
    aliases?: string[];
    /** DSNs that always fail to connect */
    failing?: string[];
    /** Fail this many times per DSN before succeeding */
    failuresBeforeSuccess?: number;
    /** Delay per connect, in ms */
    latency?: (dsn: string) => number;
    /** DSNs whose pools fail on end() */
    failOnEnd?: string[];
    tracker?: InFlightTracker;
}

export function createFakeDriver(options: FakeDriverOptions = {}) {
    const pools: FakeSqlPool[] = [];
    const attempts = new Map<string, number>();

    const driver = {
        type: options.type ?? 'postgres',
        aliases: options.aliases ?? ['pg'],
        connect: vi.fn<DatabaseDriver['connect']>(async (spec) => {
            const attempt = (attempts.get(spec.dsn) ?? 0) + 1;
            attempts.set(spec.dsn, attempt);
            await pause(options.tracker, options.latency?.(spec.dsn) ?? 0);
            if (options.failing?.includes(spec.dsn)) {
                throw new Error(`connection refused: ${spec.dsn}`);
            }
            if (attempt <= (options.failuresBeforeSuccess ?? 0)) {
                throw new Error(`transient failure ${attempt}`);
            }
            const pool = new FakeSqlPool(
                spec.dsn,
                options.failOnEnd?.includes(spec.dsn) ? new Error(`end failed: ${spec.dsn}`) : undefined
            );
            pools.push(pool);
            return pool;
        }),
    } satisfies DatabaseDriver;

    return { driver, pools };
}

export class FakeCache implements Cache {
    closeCalls = 0;

    constructor(
        readonly name: string,
        private readonly closeError?: Error
    ) {}

    client(): Redis {
        throw new Error('FakeCache has no client');
    }

    async ping(): Promise<void> {}

    async close(): Promise<void> {
        this.closeCalls++;
        if (this.closeError) {
            throw this.closeError;
        }
    }
}

export function createFakeCacheConnector(
    options: {
        failing?: string[];
        failOnClose?: string[];
        latency?: (name: string) => number;
        tracker?: InFlightTracker;
    } = {}
) {
    const caches: FakeCache[] = [];
    const connect = vi.fn<CacheConnector>(async (instance) => {
        await pause(options.tracker, options.latency?.(instance.name) ?? 0);
        if (options.failing?.includes(instance.name)) {
            throw ResourceError.connectFailed('cache', instance.name, new Error('ECONNREFUSED'));
        }
        const cache = new FakeCache(
            instance.name,
            options.failOnClose?.includes(instance.name) ? new Error(`quit failed: ${instance.name}`) : undefined
        );
        caches.push(cache);
        return cache;
    });
    return { connect, caches };
}

export class FakeObjectStorage implements ObjectStorage {
    readonly objects = new Map<string, Buffer>();
    closeCalls = 0;

    constructor(
        readonly name: string,
        readonly provider: string,
        readonly bucket: string,
        private readonly closeError?: Error
    ) {}

    async put(key: string, body: ObjectBody): Promise<void> {
        this.objects.set(key, typeof body === 'string' ? Buffer.from(body) : Buffer.from(body));
    }

    async get(key: string): Promise<Buffer> {
        const body = this.objects.get(key);
        if (!body) {
            throw ResourceError.objectNotFound(this.bucket, key);
        }
        return body;
    }

    async delete(key: string): Promise<void> {
        this.objects.delete(key);
    }

    getURL(key: string): string {
        return `memory://${this.bucket}/${key}`;
    }

    async close(): Promise<void> {
        this.closeCalls++;
        if (this.closeError) {
            throw this.closeError;
        }
    }
}

/**
 * Provider keeping objects in memory. Buckets listed in `failing` fail at connect.
 */
export function createFakeProvider(
    options: {
        type?: string;
        failing?: string[];
        failOnClose?: string[];
        latency?: (name: string) => number;
        tracker?: InFlightTracker;
    } = {}
): { provider: ObjectStorageProviderHandle; stores: FakeObjectStorage[] } {
    const stores: FakeObjectStorage[] = [];
    const type = options.type ?? 'memory';
    const provider = defineObjectStorageProvider<null, { bucket: string }>({
        type,
        async loadCredentials() {
            return null;
        },
        buildConfig(entry) {
            return { bucket: entry.bucket };
        },
        async connect(name, config) {
            await pause(options.tracker, options.latency?.(name) ?? 0);
            if (options.failing?.includes(config.bucket)) {
                throw new Error(`bucket ${config.bucket} unreachable`);
            }
            const store = new FakeObjectStorage(
                name,
                type,
                config.bucket,
                options.failOnClose?.includes(name) ? new Error(`close failed: ${name}`) : undefined
            );
            stores.push(store);
            return store;
        },
    });
    return { provider, stores };
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function pause(tracker: InFlightTracker | undefined, ms: number): Promise<void> {
    return tracker ? tracker.run(() => delay(ms)) : delay(ms);
}
