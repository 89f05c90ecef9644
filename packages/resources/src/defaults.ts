import type { Issue, Logger, Result } from '@quay/core';
import { ensureOk, fail, ok } from '@quay/core';
import type { CacheConfig, CacheInstance } from './cache/schemas.js';
import type { ConnectionSpec, DatabaseConfig } from './database/schemas.js';
import type { ObjectStorageEntry } from './object-storage/schemas.js';
import type { ResourceConfig } from './schemas.js';
import { ResourceError } from './errors.js';

export const DATABASE_DEFAULTS = {
    maxRetry: 3,
    maxOpenConns: 20,
    maxIdleConns: 5,
    retryInterval: 1000,
    connectTimeout: 10_000,
} as const;

export const CACHE_DEFAULTS = {
    maxActive: 10,
    maxIdle: 3,
    timeout: 5000,
} as const;

export interface ResolvedConnectionSpec {
    dsn: string;
    maxRetry: number;
    maxOpenConns: number;
    maxIdleConns: number;
}

export interface ResolvedDatabaseEntry {
    name: string;
    driver: string;
    leader: ResolvedConnectionSpec;
    /** Absent when no replica DSN is configured */
    replica: ResolvedConnectionSpec | undefined;
    retryInterval: number;
    connectTimeout: number;
}

export interface ResolvedDatabaseConfig {
    maxRetry: number;
    maxOpenConns: number;
    maxIdleConns: number;
    retryInterval: number;
    connectTimeout: number;
    databases: ResolvedDatabaseEntry[];
}

export interface ResolvedCacheConfig {
    maxActive: number;
    maxIdle: number;
    timeout: number;
    instances: CacheInstance[];
}

export interface ResolvedResourceConfig {
    database: ResolvedDatabaseConfig;
    cache: ResolvedCacheConfig;
    objectStorage: ObjectStorageEntry[];
}

/**
 * Fill unset database fields: family values from process defaults, then
 * connection values from the family. Pure; the input is not modified.
 *
 * Only explicit values can conflict. A defaulted idle count is clamped to the
 * open count, and a defaulted open count is raised to an explicit idle count.
 */
export function setDatabaseDefaults(config: DatabaseConfig): Result<ResolvedDatabaseConfig> {
    const issues: Issue[] = [];

    const familyPool = resolvePoolSize(config.maxOpenConns, config.maxIdleConns);
    const family = {
        maxRetry: config.maxRetry ?? DATABASE_DEFAULTS.maxRetry,
        maxOpenConns: familyPool.maxOpenConns,
        maxIdleConns: familyPool.maxIdleConns,
        retryInterval: config.retryInterval ?? DATABASE_DEFAULTS.retryInterval,
        connectTimeout: config.connectTimeout ?? DATABASE_DEFAULTS.connectTimeout,
    };

    if (familyPool.conflict) {
        issues.push(idleOverOpen(['database', 'max_idle_conns'], 'database', family));
    }

    const resolveConnection = (
        spec: ConnectionSpec,
        path: Array<string | number>
    ): ResolvedConnectionSpec => {
        const pool = resolvePoolSize(
            spec.maxOpenConns ?? config.maxOpenConns,
            spec.maxIdleConns ?? config.maxIdleConns
        );
        const resolved = {
            dsn: spec.dsn,
            maxRetry: spec.maxRetry ?? family.maxRetry,
            maxOpenConns: pool.maxOpenConns,
            maxIdleConns: pool.maxIdleConns,
        };
        // A conflict inherited whole from the family is reported once, at the family
        const ownsValues = spec.maxOpenConns !== undefined || spec.maxIdleConns !== undefined;
        if (pool.conflict && ownsValues) {
            issues.push(idleOverOpen([...path, 'max_idle_conns'], path.join('.'), resolved));
        }
        return resolved;
    };

    const databases = config.databases.map((entry, index) => {
        const base = ['database', 'databases', index];
        return {
            name: entry.name,
            driver: entry.driver,
            leader: resolveConnection(entry.leader, [...base, 'leader']),
            replica: entry.replica && resolveConnection(entry.replica, [...base, 'replica']),
            retryInterval: family.retryInterval,
            connectTimeout: family.connectTimeout,
        };
    });

    return issues.length > 0 ? fail(issues) : ok({ ...family, databases });
}

/**
 * Fill unset cache fields from process defaults. Pure.
 */
export function setCacheDefaults(config: CacheConfig): Result<ResolvedCacheConfig> {
    const maxActive = config.maxActive ?? Math.max(CACHE_DEFAULTS.maxActive, config.maxIdle ?? 0);
    const resolved: ResolvedCacheConfig = {
        maxActive,
        maxIdle: config.maxIdle ?? Math.min(CACHE_DEFAULTS.maxIdle, maxActive),
        timeout: config.timeout ?? CACHE_DEFAULTS.timeout,
        instances: config.instances.map((instance) => ({ ...instance })),
    };

    if (resolved.maxIdle > resolved.maxActive) {
        return fail([
            ResourceError.defaultsConflict(
                ['redis', 'max_idle'],
                `redis: max_idle (${resolved.maxIdle}) exceeds max_active (${resolved.maxActive})`,
                { maxIdle: resolved.maxIdle, maxActive: resolved.maxActive }
            ),
        ]);
    }
    return ok(resolved);
}

/**
 * Resolve defaults for every family, collecting all conflicts before failing
 */
export function setDefaults(config: ResourceConfig): Result<ResolvedResourceConfig> {
    const database = setDatabaseDefaults(config.database);
    const cache = setCacheDefaults(config.cache);

    if (!database.ok || !cache.ok) {
        return fail([...database.issues, ...cache.issues]);
    }

    return ok({
        database: database.data,
        cache: cache.data,
        objectStorage: config.objectStorage.map((entry) => ({ ...entry })),
    });
}

/**
 * Throwing variant used at the bring-up boundary.
 *
 * @throws QuayValidationError listing every conflict
 */
export function resolveDefaults(config: ResourceConfig, logger?: Logger): ResolvedResourceConfig {
    return ensureOk(setDefaults(config), logger);
}

function idleOverOpen(
    path: Array<string | number>,
    label: string,
    values: { maxIdleConns: number; maxOpenConns: number }
): Issue {
    return ResourceError.defaultsConflict(
        path,
        `${label}: max_idle_conns (${values.maxIdleConns}) exceeds max_open_conns (${values.maxOpenConns})`,
        { maxIdleConns: values.maxIdleConns, maxOpenConns: values.maxOpenConns }
    );
}

function resolvePoolSize(
    maxOpenConns: number | undefined,
    maxIdleConns: number | undefined
): { maxOpenConns: number; maxIdleConns: number; conflict: boolean } {
    const open = maxOpenConns ?? Math.max(DATABASE_DEFAULTS.maxOpenConns, maxIdleConns ?? 0);
    const idle = maxIdleConns ?? Math.min(DATABASE_DEFAULTS.maxIdleConns, open);
    return { maxOpenConns: open, maxIdleConns: idle, conflict: idle > open };
}
