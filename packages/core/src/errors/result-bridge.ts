import type { Result } from '../utils/result.js';
import { QuayValidationError } from './QuayValidationError.js';
import type { Logger } from '../logger/types.js';

/**
 * Bridge function to convert Result pattern to validation exceptions
 * Used at public API boundaries for validation flows
 *
 * @throws QuayValidationError if the result contains validation issues
 *
 * @example
 * ```typescript
 * const resolved = ensureOk(resolveDatabaseDefaults(config.database));
 * ```
 */
export function ensureOk<T>(result: Result<T>, logger?: Logger): T {
    if (result.ok) {
        return result.data;
    }

    logger?.error(
        `ensureOk: found validation errors, throwing QuayValidationError: ${result.issues
            .map((issue) => issue.message)
            .join('; ')}`
    );
    throw new QuayValidationError(result.issues);
}
