import { afterEach, describe, expect, it, vi } from 'vitest';
import { zodToIssues } from '@quay/core';
import { ResourceConfigSchema } from './schemas.js';
import { ResourceErrorCode } from './error-codes.js';

describe('ResourceConfigSchema', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('accepts an empty config', () => {
        const config = ResourceConfigSchema.parse({});

        expect(config.database.databases).toEqual([]);
        expect(config.cache.instances).toEqual([]);
        expect(config.objectStorage).toEqual([]);
    });

    it('transforms snake_case input into camelCase output', () => {
        const config = ResourceConfigSchema.parse({
            database: {
                max_open_conns: 40,
                retry_interval: '2s',
                databases: [
                    {
                        name: 'orders',
                        driver: 'postgres',
                        leader: { dsn: 'postgres://leader/orders', max_idle_conns: 2 },
                        replica: { dsn: 'postgres://replica/orders' },
                    },
                ],
            },
            redis: {
                max_active: 8,
                timeout: '250ms',
                instances: [{ name: 'sessions', address: 'localhost:6379' }],
            },
        });

        expect(config.database.maxOpenConns).toBe(40);
        expect(config.database.retryInterval).toBe(2000);
        expect(config.database.databases[0]?.leader).toEqual({
            dsn: 'postgres://leader/orders',
            maxRetry: undefined,
            maxOpenConns: undefined,
            maxIdleConns: 2,
        });
        expect(config.database.databases[0]?.replica?.dsn).toBe('postgres://replica/orders');
        expect(config.cache.maxActive).toBe(8);
        expect(config.cache.timeout).toBe(250);
        expect(config.cache.instances).toEqual([{ name: 'sessions', address: 'localhost:6379' }]);
    });

    it('treats a replica with an empty dsn as no replica', () => {
        const config = ResourceConfigSchema.parse({
            database: {
                databases: [
                    { name: 'main', driver: 'pg', leader: { dsn: 'postgres://x' }, replica: { dsn: '' } },
                ],
            },
        });

        expect(config.database.databases[0]?.replica).toBeUndefined();
    });

    it('expands environment references in dsn and secrets', () => {
        vi.stubEnv('QUAY_TEST_DB_PASSWORD', 'test-secret');
        vi.stubEnv('QUAY_TEST_S3_SECRET', 'placeholder-secret');

        const config = ResourceConfigSchema.parse({
            database: {
                databases: [
                    {
                        name: 'main',
                        driver: 'postgres',
                        leader: { dsn: 'postgres://app:${QUAY_TEST_DB_PASSWORD}@db/main' },
                    },
                ],
            },
            object_storage: [
                {
                    name: 'assets',
                    provider: 's3',
                    bucket: 'assets',
                    s3: { client_id: 'test-id', client_secret: '$QUAY_TEST_S3_SECRET' },
                },
            ],
        });

        expect(config.database.databases[0]?.leader.dsn).toBe('postgres://app:test-secret@db/main');
        expect(config.objectStorage[0]?.s3?.clientSecret).toBe('placeholder-secret');
    });

    it('rejects an empty driver', () => {
        const result = ResourceConfigSchema.safeParse({
            database: {
                databases: [{ name: 'main', driver: ' ', leader: { dsn: 'postgres://x' } }],
            },
        });

        expect(result.success).toBe(false);
        if (result.success) return;
        const issues = zodToIssues(result.error);
        expect(issues).toHaveLength(1);
        expect(issues[0]?.path).toEqual(['database', 'databases', 0, 'driver']);
        expect(issues[0]?.message).toBe('Database driver is required (e.g. "postgres")');
    });

    it('rejects duplicate names within a family', () => {
        const result = ResourceConfigSchema.safeParse({
            redis: {
                instances: [
                    { name: 'cache', address: 'a:6379' },
                    { name: 'cache', address: 'b:6379' },
                ],
            },
            object_storage: [
                { name: 'files', provider: 'local', bucket: 'one' },
                { name: 'files', provider: 'local', bucket: 'two' },
            ],
        });

        expect(result.success).toBe(false);
        if (result.success) return;
        const issues = zodToIssues(result.error);
        expect(issues.map((issue) => issue.path)).toEqual([
            ['redis', 'instances', 1, 'name'],
            ['object_storage', 1, 'name'],
        ]);
        expect(issues.every((issue) => issue.code === ResourceErrorCode.CONFIG_INVALID)).toBe(true);
        expect(issues[0]?.message).toBe("Duplicate redis name 'cache'");
    });

    it('allows the same name in different families', () => {
        const result = ResourceConfigSchema.safeParse({
            database: {
                databases: [{ name: 'main', driver: 'postgres', leader: { dsn: 'postgres://x' } }],
            },
            redis: { instances: [{ name: 'main', address: 'localhost:6379' }] },
            object_storage: [{ name: 'main', provider: 'local', bucket: 'main' }],
        });

        expect(result.success).toBe(true);
    });

    it('accepts unknown object storage providers so they fail per resource', () => {
        const config = ResourceConfigSchema.parse({
            object_storage: [{ name: 'legacy', provider: 'ftp', bucket: 'legacy' }],
        });

        expect(config.objectStorage[0]?.provider).toBe('ftp');
        expect(config.objectStorage[0]?.local).toEqual({ deleteOnClose: false });
    });

    it('defaults s3 flags', () => {
        const config = ResourceConfigSchema.parse({
            object_storage: [
                {
                    name: 'assets',
                    provider: 'minio',
                    bucket: 'assets',
                    s3: { client_id: 'id', client_secret: 'secret' },
                },
            ],
        });

        expect(config.objectStorage[0]?.s3).toEqual({
            clientId: 'id',
            clientSecret: 'secret',
            disableSSL: false,
            forcePathStyle: undefined,
        });
    });

    it('rejects malformed durations', () => {
        const result = ResourceConfigSchema.safeParse({ redis: { timeout: 'soon' } });
        expect(result.success).toBe(false);
    });

    it('rejects unknown top-level sections', () => {
        const result = ResourceConfigSchema.safeParse({ queues: [] });
        expect(result.success).toBe(false);
    });
});
