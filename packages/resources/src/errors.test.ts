import { describe, expect, it } from 'vitest';
import { ErrorScope, ErrorType, QuayRuntimeError } from '@quay/core';
import { ResourceErrorCode } from './error-codes.js';
import { ResourceError } from './errors.js';

describe('ResourceError', () => {
    it('scopes lookup errors by family', () => {
        const error = ResourceError.notFound('cache', 'sessions');

        expect(error.code).toBe(ResourceErrorCode.NOT_FOUND);
        expect(error.scope).toBe(ErrorScope.CACHE);
        expect(error.type).toBe(ErrorType.NOT_FOUND);
        expect(error.message).toBe('Redis with name sessions does not exist');
    });

    it('keeps already classified errors when wrapping a stage failure', () => {
        const original = ResourceError.providerNotFound('ftp', ['local']);

        expect(ResourceError.fromStage('connect', 'object_storage', 'legacy', original)).toBe(original);
    });

    it('wraps unclassified stage failures with the cause attached', () => {
        const cause = new Error('EACCES');

        const error = ResourceError.fromStage('credentials', 'object_storage', 'media', cause);

        expect(error).toBeInstanceOf(QuayRuntimeError);
        expect(error.code).toBe(ResourceErrorCode.CREDENTIALS_LOAD_FAILED);
        expect(error.cause).toBe(cause);
    });

    it('lists every failure in an aggregated bring-up error', () => {
        const error = ResourceError.bringUpIncomplete(
            [
                { family: 'database', name: 'orders', error: new Error('timeout') },
                { family: 'cache', name: 'sessions', error: ResourceError.notFound('cache', 'x') },
            ],
            5
        );

        expect(error.message).toBe(
            '2 of 5 resources failed to start: database/orders (timeout); cache/sessions (Redis with name x does not exist)'
        );
        expect(error.context?.failures).toEqual([
            { family: 'database', name: 'orders', code: undefined, message: 'timeout' },
            {
                family: 'cache',
                name: 'sessions',
                code: ResourceErrorCode.NOT_FOUND,
                message: 'Redis with name x does not exist',
            },
        ]);
    });
});
