import { z } from 'zod';
import { EnvExpandedString } from '@quay/core';
import { DurationSchema, ResourceNameSchema, refineUniqueNames } from '../schema-helpers.js';

export const CacheInstanceSchema = z
    .object({
        name: ResourceNameSchema,
        address: EnvExpandedString()
            .pipe(z.string().min(1, 'Redis address is required'))
            .describe('host:port or redis:// URL'),
    })
    .strict();

export type CacheInstance = z.output<typeof CacheInstanceSchema>;

export const CacheConfigSchema = z
    .object({
        max_active: z.number().int().positive().optional().describe('Maximum connections per instance'),
        max_idle: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Connections opened eagerly per instance'),
        timeout: DurationSchema.optional().describe('Connect and command timeout'),
        instances: z
            .array(CacheInstanceSchema)
            .default([])
            .superRefine((entries, ctx) => refineUniqueNames(entries, ctx, 'redis')),
    })
    .strict()
    .describe('Redis instances sharing pool sizing and timeout')
    .transform((config) => ({
        maxActive: config.max_active,
        maxIdle: config.max_idle,
        timeout: config.timeout,
        instances: config.instances,
    }));

export type CacheConfigInput = z.input<typeof CacheConfigSchema>;
export type CacheConfig = z.output<typeof CacheConfigSchema>;
