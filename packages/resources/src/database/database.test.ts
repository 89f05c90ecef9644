import { describe, expect, it } from 'vitest';
import { FakeSqlPool } from '../test-utils.js';
import { Database } from './database.js';

describe('Database', () => {
    it('ends a shared leader/follower pool once', async () => {
        const pool = new FakeSqlPool('postgres://leader');
        const database = new Database('main', 'postgres', pool, pool);

        await database.close();

        expect(pool.endCalls).toBe(1);
    });

    it('ends both pools when the follower is distinct', async () => {
        const leader = new FakeSqlPool('postgres://leader');
        const follower = new FakeSqlPool('postgres://replica');
        const database = new Database('main', 'postgres', leader, follower);

        await database.close();

        expect(leader.endCalls).toBe(1);
        expect(follower.endCalls).toBe(1);
    });

    it('shares the first close between repeated calls', async () => {
        const pool = new FakeSqlPool('postgres://leader');
        const database = new Database('main', 'postgres', pool, pool);

        await Promise.all([database.close(), database.close()]);
        await database.close();

        expect(pool.endCalls).toBe(1);
    });

    it('ends the follower even if the leader fails to end', async () => {
        const leader = new FakeSqlPool('postgres://leader', new Error('end failed'));
        const follower = new FakeSqlPool('postgres://replica');
        const database = new Database('main', 'postgres', leader, follower);

        await expect(database.close()).rejects.toThrow('end failed');
        expect(follower.endCalls).toBe(1);
    });
});
