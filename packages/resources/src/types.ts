/**
 * Resource families managed by the bring-up subsystem
 */
export const RESOURCE_FAMILIES = ['database', 'cache', 'object_storage'] as const;
export type ResourceFamily = (typeof RESOURCE_FAMILIES)[number];

/**
 * A resource-scoped failure, tagged with the resource it belongs to.
 */
export interface ResourceFailure {
    family: ResourceFamily;
    name: string;
    error: Error;
}

/**
 * Serializable summary of a failure, used in aggregated error contexts
 */
export interface ResourceFailureSummary {
    family: ResourceFamily;
    name: string;
    code: string | undefined;
    message: string;
}

export function summarizeFailure(failure: ResourceFailure): ResourceFailureSummary {
    const code =
        'code' in failure.error && typeof failure.error.code === 'string'
            ? failure.error.code
            : undefined;
    return {
        family: failure.family,
        name: failure.name,
        code,
        message: failure.error.message,
    };
}

/**
 * Anything the lifecycle manager can release
 */
export interface Closable {
    close(): Promise<void>;
}
