import { z } from 'zod';
import { EnvExpandedString } from '@quay/core';
import { DurationSchema, ResourceNameSchema, refineUniqueNames } from '../schema-helpers.js';

const ConnectionFieldsSchema = z.object({
    max_retry: z
        .number()
        .int()
        .nonnegative()
        .optional()
        .describe('Connect retries after the first attempt'),
    max_open_conns: z.number().int().positive().optional().describe('Maximum open connections'),
    max_idle_conns: z
        .number()
        .int()
        .nonnegative()
        .optional()
        .describe('Connections opened eagerly and kept idle'),
});

// Leader connection: a DSN is mandatory
export const LeaderConnectionSchema = ConnectionFieldsSchema.extend({
    dsn: EnvExpandedString().pipe(z.string().min(1, 'Leader dsn is required')),
})
    .strict()
    .transform((spec) => ({
        dsn: spec.dsn,
        maxRetry: spec.max_retry,
        maxOpenConns: spec.max_open_conns,
        maxIdleConns: spec.max_idle_conns,
    }));

// Replica connection: an empty DSN means "no replica"
export const ReplicaConnectionSchema = ConnectionFieldsSchema.extend({
    dsn: EnvExpandedString().default(''),
})
    .strict()
    .transform((spec) =>
        spec.dsn === ''
            ? undefined
            : {
                  dsn: spec.dsn,
                  maxRetry: spec.max_retry,
                  maxOpenConns: spec.max_open_conns,
                  maxIdleConns: spec.max_idle_conns,
              }
    );

export type ConnectionSpec = z.output<typeof LeaderConnectionSchema>;

export const DatabaseEntrySchema = z
    .object({
        name: ResourceNameSchema,
        driver: z
            .string()
            .trim()
            .min(1, 'Database driver is required (e.g. "postgres")')
            .describe('Driver identifier, matched case-insensitively'),
        leader: LeaderConnectionSchema,
        replica: ReplicaConnectionSchema.optional(),
    })
    .strict()
    .transform((entry) => ({
        name: entry.name,
        driver: entry.driver,
        leader: entry.leader,
        replica: entry.replica,
    }));

export type DatabaseEntry = z.output<typeof DatabaseEntrySchema>;

export const DatabaseConfigSchema = z
    .object({
        max_retry: z.number().int().nonnegative().optional(),
        max_open_conns: z.number().int().positive().optional(),
        max_idle_conns: z.number().int().nonnegative().optional(),
        retry_interval: DurationSchema.optional().describe('Delay between connect attempts'),
        connect_timeout: DurationSchema.optional().describe('Timeout of a single connect attempt'),
        databases: z
            .array(DatabaseEntrySchema)
            .default([])
            .superRefine((entries, ctx) => refineUniqueNames(entries, ctx, 'database')),
    })
    .strict()
    .describe('Relational databases with leader/replica topology and family-wide defaults')
    .transform((config) => ({
        maxRetry: config.max_retry,
        maxOpenConns: config.max_open_conns,
        maxIdleConns: config.max_idle_conns,
        retryInterval: config.retry_interval,
        connectTimeout: config.connect_timeout,
        databases: config.databases,
    }));

export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;
export type DatabaseConfig = z.output<typeof DatabaseConfigSchema>;
