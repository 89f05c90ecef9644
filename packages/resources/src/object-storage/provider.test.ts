import { describe, expect, it, vi } from 'vitest';
import { QuayRuntimeError } from '@quay/core';
import { createSilentMockLogger } from '@quay/core/test-utils';
import { ResourceErrorCode } from '../error-codes.js';
import { FakeObjectStorage } from '../test-utils.js';
import { defineObjectStorageProvider } from './provider.js';
import { ObjectStorageProviderRegistry } from './registry.js';
import { initObjectStorage } from './resolver.js';
import { ObjectStorageEntrySchema, type ObjectStorageEntry } from './schemas.js';

const logger = createSilentMockLogger();
const entry = ObjectStorageEntrySchema.parse({ name: 'assets', provider: 'memory', bucket: 'assets' });

function stagedProvider(failAt?: 'credentials' | 'config' | 'connect') {
    return defineObjectStorageProvider<string, { bucket: string; token: string }>({
        type: 'memory',
        aliases: ['mem'],
        loadCredentials: vi.fn(async () => {
            if (failAt === 'credentials') throw new Error('key file missing');
            return 'token';
        }),
        buildConfig: vi.fn((e: ObjectStorageEntry, token: string) => {
            if (failAt === 'config') throw new Error('bucket url malformed');
            return { bucket: e.bucket, token };
        }),
        connect: vi.fn(async (name: string, config: { bucket: string; token: string }) => {
            if (failAt === 'connect') throw new Error('403 forbidden');
            return new FakeObjectStorage(name, 'memory', config.bucket);
        }),
    });
}

describe('defineObjectStorageProvider', () => {
    it('runs every stage and returns the store', async () => {
        const store = await stagedProvider().create(entry, logger);

        expect(store.name).toBe('assets');
        expect(store.bucket).toBe('assets');
    });

    it.each([
        ['credentials', ResourceErrorCode.CREDENTIALS_LOAD_FAILED, 'key file missing'],
        ['config', ResourceErrorCode.PROVIDER_CONFIG_INVALID, 'bucket url malformed'],
        ['connect', ResourceErrorCode.CONNECT_FAILED, '403 forbidden'],
    ] as const)('maps a %s failure to its own code', async (stage, code, cause) => {
        const error = await stagedProvider(stage)
            .create(entry, logger)
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(QuayRuntimeError);
        if (!(error instanceof QuayRuntimeError)) return;
        expect(error.code).toBe(code);
        expect(error.context).toEqual({ family: 'object_storage', name: 'assets', stage });
        expect(error.cause).toBeInstanceOf(Error);
        expect(error.message).toContain(cause);
    });
});

describe('initObjectStorage', () => {
    it('resolves the provider case-insensitively and by alias', async () => {
        const providers = new ObjectStorageProviderRegistry();
        providers.register(stagedProvider());

        const store = await initObjectStorage({ ...entry, provider: 'MEM' }, { providers, logger });

        expect(store.provider).toBe('memory');
    });

    it('fails with provider_not_found for an unknown provider', async () => {
        const providers = new ObjectStorageProviderRegistry();
        providers.register(stagedProvider());

        await expect(
            initObjectStorage({ ...entry, provider: 'ftp' }, { providers, logger })
        ).rejects.toMatchObject({
            code: ResourceErrorCode.PROVIDER_NOT_FOUND,
            message: "Object storage provider 'ftp' not found",
            context: { provider: 'ftp', available: ['memory'] },
        });
    });
});
