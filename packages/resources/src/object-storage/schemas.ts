import { z } from 'zod';
import { EnvExpandedString } from '@quay/core';
import { ResourceNameSchema, refineUniqueNames } from '../schema-helpers.js';

const GcsCredentialsSchema = z
    .object({
        json_key: EnvExpandedString().describe('Path to a service account JSON key file'),
    })
    .strict();

const S3CredentialsSchema = z
    .object({
        client_id: EnvExpandedString().describe('Access key id'),
        client_secret: EnvExpandedString().describe('Secret access key'),
        disable_ssl: z.boolean().default(false).describe('Use plain HTTP for the endpoint'),
        force_path_style: z
            .boolean()
            .optional()
            .describe('Address buckets as <endpoint>/<bucket> instead of <bucket>.<endpoint>'),
    })
    .strict();

const LocalOptionsSchema = z
    .object({
        delete_on_close: z
            .boolean()
            .default(false)
            .describe('Remove the bucket directory when the storage is closed'),
    })
    .strict();

/**
 * Object storage entry.
 *
 * `provider` is not checked here; an unknown provider fails that one
 * resource at bring-up.
 */
export const ObjectStorageEntrySchema = z
    .object({
        name: ResourceNameSchema,
        provider: z.string().trim().describe('local, gcs, s3, do, minio (case-insensitive)'),
        bucket: z.string().trim().min(1, 'Bucket is required'),
        bucket_proto: z.string().trim().optional().describe('Protocol used in public object URLs'),
        bucket_url: z.string().trim().optional().describe('Host (and path) used in public object URLs'),
        region: z.string().trim().optional(),
        endpoint: EnvExpandedString().optional(),
        gcs: GcsCredentialsSchema.optional(),
        s3: S3CredentialsSchema.optional(),
        local: LocalOptionsSchema.default({}),
    })
    .strict()
    .transform((entry) => ({
        name: entry.name,
        provider: entry.provider,
        bucket: entry.bucket,
        bucketProto: entry.bucket_proto,
        bucketURL: entry.bucket_url,
        region: entry.region,
        endpoint: entry.endpoint,
        gcs: entry.gcs && { jsonKey: entry.gcs.json_key },
        s3: entry.s3 && {
            clientId: entry.s3.client_id,
            clientSecret: entry.s3.client_secret,
            disableSSL: entry.s3.disable_ssl,
            forcePathStyle: entry.s3.force_path_style,
        },
        local: { deleteOnClose: entry.local.delete_on_close },
    }));

export type ObjectStorageEntryInput = z.input<typeof ObjectStorageEntrySchema>;
export type ObjectStorageEntry = z.output<typeof ObjectStorageEntrySchema>;

export const ObjectStorageConfigSchema = z
    .array(ObjectStorageEntrySchema)
    .default([])
    .superRefine((entries, ctx) => refineUniqueNames(entries, ctx, 'object storage'))
    .describe('Object storage buckets across providers');
