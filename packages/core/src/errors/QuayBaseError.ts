import { ErrorScope, ErrorType } from './types.js';

/**
 * Abstract base for every error raised by Quay packages.
 * Carries the scope/type pair used for classification and HTTP mapping.
 */
export abstract class QuayBaseError extends Error {
    public readonly scope: ErrorScope | string;
    public readonly type: ErrorType;

    protected constructor(
        message: string,
        scope: ErrorScope | string,
        type: ErrorType,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
        this.scope = scope;
        this.type = type;
    }

    /**
     * Serializable representation (API responses, structured logs)
     */
    abstract toJSON(): Record<string, unknown>;
}
