import {
    DeleteObjectCommand,
    GetObjectCommand,
    HeadBucketCommand,
    PutObjectCommand,
    S3Client,
} from '@aws-sdk/client-s3';
import type { Logger } from '@quay/core';
import { errorMessage } from '@quay/core';
import { ResourceError } from '../../errors.js';
import { buildObjectURL, toBuffer, validateObjectKey } from '../object-utils.js';
import { defineObjectStorageProvider } from '../provider.js';
import type { ObjectStorageProviderHandle } from '../provider.js';
import type { ObjectStorageEntry } from '../schemas.js';
import type { BucketAddress, ObjectBody, ObjectStorage, PutObjectOptions } from '../types.js';

export interface S3Credentials {
    accessKeyId: string;
    secretAccessKey: string;
}

export interface S3StorageConfig extends BucketAddress {
    provider: string;
    region: string;
    /** Host (no scheme) requests go to, e.g. `nyc3.digitaloceanspaces.com` */
    endpointHost: string;
    /** Full endpoint URL given to the client; absent for AWS defaults */
    endpoint: string | undefined;
    disableSSL: boolean;
    forcePathStyle: boolean;
    credentials: S3Credentials;
}

/**
 * Per-flavour defaults applied before the common S3 config is built
 */
interface S3Flavour {
    type: string;
    aliases?: readonly string[];
    defaultRegion: string | undefined;
    forcePathStyle: boolean;
    /** Endpoint host used when none is configured; undefined means one is required */
    defaultEndpointHost(region: string): string | undefined;
}

function stripScheme(endpoint: string): string {
    return endpoint.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').replace(/\/+$/, '');
}

function isMissingObject(error: unknown): boolean {
    return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}

export class S3ObjectStore implements ObjectStorage {
    private closed = false;

    constructor(
        readonly name: string,
        private readonly config: S3StorageConfig,
        private readonly client: S3Client
    ) {}

    get provider(): string {
        return this.config.provider;
    }

    get bucket(): string {
        return this.config.bucket;
    }

    async put(key: string, body: ObjectBody, options: PutObjectOptions = {}): Promise<void> {
        await this.client.send(
            new PutObjectCommand({
                Bucket: this.bucket,
                Key: validateObjectKey(key),
                Body: toBuffer(body),
                ...(options.contentType && { ContentType: options.contentType }),
            })
        );
    }

    async get(key: string): Promise<Buffer> {
        try {
            const response = await this.client.send(
                new GetObjectCommand({ Bucket: this.bucket, Key: validateObjectKey(key) })
            );
            if (!response.Body) {
                throw ResourceError.objectNotFound(this.bucket, key);
            }
            return Buffer.from(await response.Body.transformToByteArray());
        } catch (error) {
            if (isMissingObject(error)) {
                throw ResourceError.objectNotFound(this.bucket, key);
            }
            throw error;
        }
    }

    async delete(key: string): Promise<void> {
        await this.client.send(
            new DeleteObjectCommand({ Bucket: this.bucket, Key: validateObjectKey(key) })
        );
    }

    getURL(key: string): string {
        return buildObjectURL(this.config, key);
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.client.destroy();
    }
}

export function buildS3Config(
    flavour: S3Flavour,
    entry: ObjectStorageEntry,
    credentials: S3Credentials
): S3StorageConfig {
    const region = entry.region || flavour.defaultRegion;
    if (!region) {
        throw new Error(`region is required for provider ${flavour.type}`);
    }

    const endpointHost = entry.endpoint
        ? stripScheme(entry.endpoint)
        : flavour.defaultEndpointHost(region);
    if (!endpointHost) {
        throw new Error(`endpoint is required for provider ${flavour.type}`);
    }

    const disableSSL = entry.s3?.disableSSL ?? false;
    const forcePathStyle = entry.s3?.forcePathStyle ?? flavour.forcePathStyle;
    const scheme = disableSSL ? 'http' : 'https';

    return {
        provider: flavour.type,
        bucket: entry.bucket,
        proto: entry.bucketProto || scheme,
        url:
            entry.bucketURL ||
            (forcePathStyle ? `${endpointHost}/${entry.bucket}` : `${entry.bucket}.${endpointHost}`),
        region,
        endpointHost,
        // AWS itself needs no explicit endpoint unless one was configured
        endpoint:
            entry.endpoint || flavour.type !== 's3' ? `${scheme}://${endpointHost}` : undefined,
        disableSSL,
        forcePathStyle,
        credentials,
    };
}

/**
 * One S3-compatible implementation shared by several provider types
 */
export function defineS3CompatibleProvider(flavour: S3Flavour): ObjectStorageProviderHandle {
    return defineObjectStorageProvider<S3Credentials, S3StorageConfig>({
        type: flavour.type,
        ...(flavour.aliases && { aliases: flavour.aliases }),
        async loadCredentials(entry) {
            const accessKeyId = entry.s3?.clientId ?? '';
            const secretAccessKey = entry.s3?.clientSecret ?? '';
            if (!accessKeyId || !secretAccessKey) {
                throw new Error('s3.client_id and s3.client_secret are required');
            }
            return { accessKeyId, secretAccessKey };
        },
        buildConfig(entry, credentials) {
            return buildS3Config(flavour, entry, credentials);
        },
        async connect(name, config, logger: Logger) {
            const client = new S3Client({
                region: config.region,
                ...(config.endpoint && { endpoint: config.endpoint }),
                forcePathStyle: config.forcePathStyle,
                credentials: config.credentials,
            });

            try {
                await client.send(new HeadBucketCommand({ Bucket: config.bucket }));
            } catch (error) {
                client.destroy();
                throw new Error(`Bucket ${config.bucket} is not reachable: ${errorMessage(error)}`, {
                    cause: error,
                });
            }

            logger.debug(
                `${config.provider} object storage ${name} bound to bucket ${config.bucket} at ${config.endpointHost}`
            );
            return new S3ObjectStore(name, config, client);
        },
    });
}

export const s3StorageProvider = defineS3CompatibleProvider({
    type: 's3',
    aliases: ['aws'],
    defaultRegion: 'us-east-1',
    forcePathStyle: false,
    defaultEndpointHost: (region) => `s3.${region}.amazonaws.com`,
});

export const digitalOceanStorageProvider = defineS3CompatibleProvider({
    type: 'do',
    aliases: ['spaces', 'digitalocean'],
    defaultRegion: undefined,
    forcePathStyle: false,
    defaultEndpointHost: (region) => `${region}.digitaloceanspaces.com`,
});

export const minioStorageProvider = defineS3CompatibleProvider({
    type: 'minio',
    defaultRegion: 'us-east-1',
    forcePathStyle: true,
    defaultEndpointHost: () => undefined,
});
