import { QuayBaseError } from './QuayBaseError.js';
import { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a stable code and typed context.
 *
 * Domain code never constructs this directly; each domain exposes a static
 * error factory (e.g. `ResourceError.connectFailed(...)`) that fills in the
 * code, scope and type.
 */
export class QuayRuntimeError<C = Record<string, unknown>> extends QuayBaseError {
    public readonly code: string;
    public readonly context: C | undefined;
    public readonly recovery: string | undefined;

    constructor(
        code: string,
        scope: ErrorScope | string,
        type: ErrorType,
        message: string,
        context?: C,
        recovery?: string,
        options?: { cause?: unknown }
    ) {
        super(message, scope, type, options);
        this.code = code;
        this.context = context;
        this.recovery = recovery;
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}
