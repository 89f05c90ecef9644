import { afterEach, describe, expect, it, vi } from 'vitest';
import { createMockLogger } from '@quay/core/test-utils';
import { Database } from '../database/database.js';
import { ResourceErrorCode } from '../error-codes.js';
import { FakeCache, FakeObjectStorage, FakeSqlPool } from '../test-utils.js';
import { ResourceRegistry } from './resource-registry.js';

function buildRegistry(onFatal?: (error: Error) => never) {
    const pool = new FakeSqlPool('postgres://main');
    const logger = createMockLogger();
    const registry = new ResourceRegistry(
        {
            database: new Map([['main', new Database('main', 'postgres', pool, pool)]]),
            cache: new Map([['sessions', new FakeCache('sessions')]]),
            object_storage: new Map([['assets', new FakeObjectStorage('assets', 'memory', 'assets')]]),
        },
        { logger, ...(onFatal && { onFatal }) }
    );
    return { registry, logger };
}

describe('ResourceRegistry', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('returns handles for configured names', () => {
        const { registry } = buildRegistry();

        const result = registry.getDatabase('main');

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.name).toBe('main');
        expect(registry.getCache('sessions').ok).toBe(true);
        expect(registry.getObjectStorage('assets').ok).toBe(true);
    });

    it('returns a lookup error for unknown names without exiting', () => {
        const exit = vi.spyOn(process, 'exit').mockImplementation((): never => {
            throw new Error('process.exit called');
        });
        const { registry } = buildRegistry();

        const result = registry.getObjectStorage('missing');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.code).toBe(ResourceErrorCode.NOT_FOUND);
        expect(result.error.message).toBe('Object storage with name missing does not exist');
        expect(result.error.context).toEqual({ family: 'object_storage', name: 'missing' });
        expect(exit).not.toHaveBeenCalled();
    });

    it('does not share names across families', () => {
        const { registry } = buildRegistry();

        expect(registry.get('cache', 'main').ok).toBe(false);
    });

    it('exits the process when a mustGet lookup misses', () => {
        const exit = vi.spyOn(process, 'exit').mockImplementation((): never => {
            throw new Error('process.exit called');
        });
        const { registry, logger } = buildRegistry();

        expect(() => registry.mustGetDatabase('analytics')).toThrow('process.exit called');
        expect(exit).toHaveBeenCalledWith(1);
        expect(logger.error).toHaveBeenCalledWith('Sql database with name analytics does not exist', {
            family: 'database',
            name: 'analytics',
            code: ResourceErrorCode.NOT_FOUND,
        });
    });

    it('hands misses to a custom fatal handler', () => {
        const onFatal = vi.fn((error: Error): never => {
            throw error;
        });
        const { registry } = buildRegistry(onFatal);

        expect(() => registry.mustGetObjectStorage('missing')).toThrow(
            'Object storage with name missing does not exist'
        );
        expect(onFatal).toHaveBeenCalledTimes(1);
    });

    it('returns the handle from mustGet when present', () => {
        const { registry } = buildRegistry();

        expect(registry.mustGetCache('sessions').name).toBe('sessions');
        expect(registry.mustGet('object_storage', 'assets').bucket).toBe('assets');
    });

    it('reports names and size', () => {
        const { registry } = buildRegistry();

        expect(registry.size).toBe(3);
        expect(registry.names('cache')).toEqual(['sessions']);
    });

    it('starts empty', () => {
        const registry = ResourceRegistry.empty({ logger: createMockLogger() });

        expect(registry.size).toBe(0);
        expect(registry.names('database')).toEqual([]);
    });
});
