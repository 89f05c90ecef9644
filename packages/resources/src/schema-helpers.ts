import { z } from 'zod';
import { ErrorScope, ErrorType } from '@quay/core';
import { ResourceErrorCode } from './error-codes.js';

/**
 * Reject entries that reuse a name within the same family.
 * Issues point at the duplicate entry's `name` field.
 */
export function refineUniqueNames<T extends { name: string }>(
    entries: T[],
    ctx: z.RefinementCtx,
    familyLabel: string
): void {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
        if (seen.has(entry.name)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Duplicate ${familyLabel} name '${entry.name}'`,
                path: [index, 'name'],
                params: {
                    code: ResourceErrorCode.CONFIG_INVALID,
                    scope: ErrorScope.CONFIG,
                    type: ErrorType.USER,
                },
            });
        }
        seen.add(entry.name);
    });
}

const DURATION_PATTERN = /^(\d+)(ms|s|m)$/;
const DURATION_UNITS: Record<string, number> = { ms: 1, s: 1000, m: 60_000 };

/**
 * Duration in milliseconds, given as a number or a string such as "250ms", "5s" or "1m"
 */
export const DurationSchema = z.union([
    z.number().int().nonnegative(),
    z
        .string()
        .trim()
        .regex(DURATION_PATTERN, 'Expected a duration such as "250ms", "5s" or "1m"')
        .transform((value) => {
            const match = DURATION_PATTERN.exec(value);
            const amount = Number(match?.[1] ?? 0);
            const unit = DURATION_UNITS[match?.[2] ?? 'ms'] ?? 1;
            return amount * unit;
        }),
]);

export const ResourceNameSchema = z
    .string()
    .trim()
    .min(1, 'Resource name is required')
    .describe('Unique name within the resource family');
