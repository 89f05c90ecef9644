import type { ZodError, ZodIssue } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue, Severity } from '../errors/types.js';

/**
 * Result of a validation-style operation.
 * Warnings may accompany a successful result; a failure always carries at least one error issue.
 */
export type Result<T, C = Record<string, unknown>> =
    | { ok: true; data: T; issues: Issue<C>[] }
    | { ok: false; issues: Issue<C>[] };

export function ok<T, C = Record<string, unknown>>(data: T, issues: Issue<C>[] = []): Result<T, C> {
    return { ok: true, data, issues };
}

export function fail<T, C = Record<string, unknown>>(issues: Issue<C>[]): Result<T, C> {
    return { ok: false, issues };
}

export function hasErrors<C>(issues: Issue<C>[]): boolean {
    return issues.some((issue) => issue.severity === 'error');
}

export function splitIssues<C>(issues: Issue<C>[]): { errors: Issue<C>[]; warnings: Issue<C>[] } {
    return {
        errors: issues.filter((issue) => issue.severity === 'error'),
        warnings: issues.filter((issue) => issue.severity === 'warning'),
    };
}

/**
 * Convert a ZodError into Issues.
 * Custom issues may carry `params: { code, scope, type }` to override the defaults.
 */
export function zodToIssues(
    error: ZodError,
    severity: Severity = 'error',
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue[] {
    return error.issues.map((issue: ZodIssue) => {
        const params = issue.code === 'custom' ? readIssueParams(issue.params) : {};
        return {
            code: params.code ?? 'schema_validation',
            message: issue.message,
            scope: params.scope ?? scope,
            type: params.type ?? ErrorType.USER,
            severity,
            path: issue.path,
            context: {},
        };
    });
}

function readIssueParams(params: unknown): {
    code?: string;
    scope?: string;
    type?: ErrorType;
} {
    if (typeof params !== 'object' || params === null) {
        return {};
    }
    const code = 'code' in params && typeof params.code === 'string' ? params.code : undefined;
    const scope = 'scope' in params && typeof params.scope === 'string' ? params.scope : undefined;
    const type =
        'type' in params && isErrorType(params.type) ? params.type : undefined;
    return {
        ...(code !== undefined && { code }),
        ...(scope !== undefined && { scope }),
        ...(type !== undefined && { type }),
    };
}

function isErrorType(value: unknown): value is ErrorType {
    return Object.values<unknown>(ErrorType).includes(value);
}
