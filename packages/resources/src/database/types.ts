import type { BaseProvider, Logger } from '@quay/core';
import type { ResolvedConnectionSpec } from '../defaults.js';

export type ConnectionRole = 'leader' | 'follower';

/**
 * Minimal pool surface the rest of the process relies on.
 * Drivers wrap their native pool; the native object stays reachable on the wrapper.
 */
export interface SqlPool {
    query<R extends Record<string, unknown> = Record<string, unknown>>(
        text: string,
        params?: unknown[]
    ): Promise<{ rows: R[] }>;
    end(): Promise<void>;
}

export interface DriverConnectOptions {
    /** Database entry name, for logs and errors */
    name: string;
    role: ConnectionRole;
    /** Timeout of a single connect attempt in ms */
    connectTimeout: number;
}

/**
 * A database driver opens one pool for one connection spec.
 * Retries belong to the caller; a driver makes a single attempt.
 */
export interface DatabaseDriver extends BaseProvider {
    type: string;
    aliases?: readonly string[];
    connect(spec: ResolvedConnectionSpec, options: DriverConnectOptions, logger: Logger): Promise<SqlPool>;
}
