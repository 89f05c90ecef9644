import { QuayBaseError } from './QuayBaseError.js';
import { ErrorType } from './types.js';
import type { Issue } from './types.js';

/**
 * Validation error carrying every issue found, not only the first.
 * The message is taken from the first error-severity issue.
 */
export class QuayValidationError extends QuayBaseError {
    public readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const primary = issues.find((issue) => issue.severity === 'error') ?? issues[0];
        super(
            primary?.message ?? 'Validation failed',
            primary?.scope ?? 'unknown',
            primary?.type ?? ErrorType.USER
        );
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((issue) => issue.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((issue) => issue.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            scope: this.scope,
            type: this.type,
            issues: this.issues,
        };
    }
}
