import type { Logger, QuayRuntimeError } from '@quay/core';
import { toError } from '@quay/core';
import type { AggregatedFailuresContext } from '../errors.js';
import { ResourceError } from '../errors.js';
import type { Closable, ResourceFailure, ResourceFamily } from '../types.js';
import type { ResourceRegistry } from './resource-registry.js';

/** Object stores first, caches last */
export const CLOSE_ORDER: readonly ResourceFamily[] = ['object_storage', 'database', 'cache'];

// Handles already handed to close(), across every registry and call
const closedHandles = new WeakSet<Closable>();

/**
 * Close every resource held by the registry, family by family in
 * {@link CLOSE_ORDER}; closes within a family run concurrently.
 *
 * Failures do not stop the sweep. Each handle is closed at most once, so a
 * second call is a no-op.
 *
 * @returns null when everything closed, otherwise a `resources_close_failed` error listing every failure
 */
export async function closeAll(
    registry: ResourceRegistry,
    logger: Logger
): Promise<QuayRuntimeError<AggregatedFailuresContext> | null> {
    const failures: ResourceFailure[] = [];
    let closed = 0;

    for (const family of CLOSE_ORDER) {
        const pending = registry
            .entries(family)
            .filter(([, handle]) => !closedHandles.has(handle))
            .map(async ([name, handle]): Promise<void> => {
                closedHandles.add(handle);
                try {
                    await handle.close();
                    closed++;
                    logger.debug(`Closed ${family} ${name}`);
                } catch (error) {
                    const err = toError(error);
                    logger.error(`Failed to close ${family} ${name}: ${err.message}`);
                    failures.push({ family, name, error: err });
                }
            });
        await Promise.all(pending);
    }

    if (failures.length > 0) {
        return ResourceError.closeFailed(failures);
    }
    if (closed > 0) {
        logger.info(`Closed ${closed} resources`);
    }
    return null;
}
