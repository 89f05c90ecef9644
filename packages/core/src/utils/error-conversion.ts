/**
 * Utility functions for converting various error types to proper Error instances
 * with meaningful messages instead of "[object Object]"
 */

/**
 * Converts any error value to an Error instance with a meaningful message
 *
 * @param error - The error value to convert (can be Error, object, string, etc.)
 * @returns Error instance with extracted or serialized message
 */
export function toError(error: unknown): Error {
    if (error instanceof Error) {
        return error;
    }

    if (error && typeof error === 'object') {
        if ('message' in error && typeof error.message === 'string') {
            return new Error(error.message, { cause: error });
        }
        if ('error' in error && typeof error.error === 'string') {
            return new Error(error.error, { cause: error });
        }

        try {
            return new Error(JSON.stringify(error), { cause: error });
        } catch {
            return new Error(String(error), { cause: error });
        }
    }

    if (typeof error === 'string') {
        return new Error(error, { cause: error });
    }

    return new Error(String(error), { cause: error });
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
