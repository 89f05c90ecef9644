import type { Closable } from '../types.js';
import type { SqlPool } from './types.js';

/**
 * Connected database: a leader pool for writes and a follower pool for reads.
 * Without a replica the follower is the leader itself.
 */
export class Database implements Closable {
    private closing: Promise<void> | null = null;

    constructor(
        readonly name: string,
        readonly driver: string,
        readonly leader: SqlPool,
        readonly follower: SqlPool
    ) {}

    get hasReplica(): boolean {
        return this.follower !== this.leader;
    }

    /**
     * End the leader and, when distinct, the follower. Repeated calls share the first close.
     */
    close(): Promise<void> {
        this.closing ??= this.endPools();
        return this.closing;
    }

    private async endPools(): Promise<void> {
        const pools = this.hasReplica ? [this.leader, this.follower] : [this.leader];
        const results = await Promise.allSettled(pools.map((pool) => pool.end()));
        const rejected = results.find(
            (result): result is PromiseRejectedResult => result.status === 'rejected'
        );
        if (rejected) {
            throw rejected.reason;
        }
    }
}
