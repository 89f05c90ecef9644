import { promises as fs } from 'fs';
import { Storage } from '@google-cloud/storage';
import type { Bucket } from '@google-cloud/storage';
import { z } from 'zod';
import type { Logger } from '@quay/core';
import { ResourceError } from '../../errors.js';
import { buildObjectURL, toBuffer, validateObjectKey } from '../object-utils.js';
import { defineObjectStorageProvider } from '../provider.js';
import type { BucketAddress, ObjectBody, ObjectStorage, PutObjectOptions } from '../types.js';

/**
 * Fields of a service account JSON key that the client needs
 */
export const GcsServiceAccountKeySchema = z
    .object({
        type: z.literal('service_account'),
        project_id: z.string().min(1),
        private_key: z.string().min(1),
        client_email: z.string().email(),
    })
    .passthrough();

export type GcsServiceAccountKey = z.output<typeof GcsServiceAccountKeySchema>;

export interface GcsStorageConfig extends BucketAddress {
    projectId: string;
    clientEmail: string;
    privateKey: string;
}

export const GCS_DEFAULT_HOST = 'storage.googleapis.com';

function hasStatusCode(error: unknown, code: number): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export class GcsObjectStore implements ObjectStorage {
    readonly provider = 'gcs';

    constructor(
        readonly name: string,
        private readonly config: GcsStorageConfig,
        private readonly handle: Bucket
    ) {}

    get bucket(): string {
        return this.config.bucket;
    }

    async put(key: string, body: ObjectBody, options: PutObjectOptions = {}): Promise<void> {
        await this.handle.file(validateObjectKey(key)).save(toBuffer(body), {
            resumable: false,
            ...(options.contentType && { contentType: options.contentType }),
        });
    }

    async get(key: string): Promise<Buffer> {
        try {
            const [contents] = await this.handle.file(validateObjectKey(key)).download();
            return contents;
        } catch (error) {
            if (hasStatusCode(error, 404)) {
                throw ResourceError.objectNotFound(this.bucket, key);
            }
            throw error;
        }
    }

    async delete(key: string): Promise<void> {
        await this.handle.file(validateObjectKey(key)).delete({ ignoreNotFound: true });
    }

    getURL(key: string): string {
        return buildObjectURL(this.config, key);
    }

    // The client holds no long-lived connections
    async close(): Promise<void> {}
}

/**
 * Google Cloud Storage, authenticated with a service account key file (`gcs.json_key`)
 */
export const gcsStorageProvider = defineObjectStorageProvider<GcsServiceAccountKey, GcsStorageConfig>({
    type: 'gcs',
    aliases: ['google'],
    async loadCredentials(entry) {
        const keyPath = entry.gcs?.jsonKey;
        if (!keyPath) {
            throw new Error('gcs.json_key is required');
        }
        const raw = await fs.readFile(keyPath, 'utf-8');
        return GcsServiceAccountKeySchema.parse(JSON.parse(raw));
    },
    buildConfig(entry, credentials) {
        return {
            bucket: entry.bucket,
            proto: entry.bucketProto || 'https',
            url: entry.bucketURL || `${GCS_DEFAULT_HOST}/${entry.bucket}`,
            projectId: credentials.project_id,
            clientEmail: credentials.client_email,
            privateKey: credentials.private_key,
        };
    },
    async connect(name, config, logger: Logger) {
        const storage = new Storage({
            projectId: config.projectId,
            credentials: {
                client_email: config.clientEmail,
                private_key: config.privateKey,
            },
        });
        const bucket = storage.bucket(config.bucket);
        const [exists] = await bucket.exists();
        if (!exists) {
            throw new Error(`Bucket ${config.bucket} does not exist`);
        }
        logger.debug(`GCS object storage ${name} bound to bucket ${config.bucket}`);
        return new GcsObjectStore(name, config, bucket);
    },
});
