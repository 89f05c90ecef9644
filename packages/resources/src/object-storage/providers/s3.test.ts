import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSilentMockLogger } from '@quay/core/test-utils';
import { ResourceErrorCode } from '../../error-codes.js';
import { ObjectStorageEntrySchema, type ObjectStorageEntryInput } from '../schemas.js';
import {
    buildS3Config,
    digitalOceanStorageProvider,
    minioStorageProvider,
    s3StorageProvider,
} from './s3.js';

const sdk = vi.hoisted(() => {
    class Command {
        constructor(readonly input: Record<string, unknown>) {}
    }
    class HeadBucketCommand extends Command {}
    class PutObjectCommand extends Command {}
    class GetObjectCommand extends Command {}
    class DeleteObjectCommand extends Command {}

    class S3Client {
        static instances: S3Client[] = [];
        static headError: Error | null = null;
        static objects = new Map<string, Uint8Array>();

        destroy = vi.fn();
        sent: Command[] = [];

        constructor(readonly config: Record<string, unknown>) {
            S3Client.instances.push(this);
        }

        async send(command: Command): Promise<unknown> {
            this.sent.push(command);
            const key = String(command.input['Key']);
            if (command instanceof HeadBucketCommand) {
                if (S3Client.headError) throw S3Client.headError;
                return {};
            }
            if (command instanceof PutObjectCommand) {
                const body = command.input['Body'];
                if (body instanceof Uint8Array) S3Client.objects.set(key, body);
                return {};
            }
            if (command instanceof GetObjectCommand) {
                const body = S3Client.objects.get(key);
                if (!body) {
                    const error = new Error('The specified key does not exist.');
                    error.name = 'NoSuchKey';
                    throw error;
                }
                return { Body: { transformToByteArray: async () => body } };
            }
            if (command instanceof DeleteObjectCommand) {
                S3Client.objects.delete(key);
                return {};
            }
            throw new Error('unexpected command');
        }
    }

    return { S3Client, HeadBucketCommand, PutObjectCommand, GetObjectCommand, DeleteObjectCommand };
});

vi.mock('@aws-sdk/client-s3', () => sdk);

const logger = createSilentMockLogger();
const credentials = { accessKeyId: 'test-id', secretAccessKey: 'test-secret' };

function entry(overrides: Partial<ObjectStorageEntryInput> = {}) {
    return ObjectStorageEntrySchema.parse({
        name: 'assets',
        provider: 's3',
        bucket: 'assets',
        s3: { client_id: 'test-id', client_secret: 'test-secret' },
        ...overrides,
    });
}

describe('buildS3Config', () => {
    const s3 = {
        type: 's3',
        defaultRegion: 'us-east-1',
        forcePathStyle: false,
        defaultEndpointHost: (region: string) => `s3.${region}.amazonaws.com`,
    };

    it('uses virtual-hosted addresses on AWS without an explicit endpoint', () => {
        const config = buildS3Config(s3, entry({ region: 'eu-west-1' }), credentials);

        expect(config).toMatchObject({
            region: 'eu-west-1',
            endpointHost: 's3.eu-west-1.amazonaws.com',
            endpoint: undefined,
            proto: 'https',
            url: 'assets.s3.eu-west-1.amazonaws.com',
            forcePathStyle: false,
        });
    });

    it('switches to http when ssl is disabled', () => {
        const config = buildS3Config(
            s3,
            entry({
                endpoint: 'http://storage.local:9000/',
                s3: { client_id: 'id', client_secret: 'secret', disable_ssl: true, force_path_style: true },
            }),
            credentials
        );

        expect(config.endpoint).toBe('http://storage.local:9000');
        expect(config.proto).toBe('http');
        expect(config.url).toBe('storage.local:9000/assets');
    });
});

describe('S3-compatible providers', () => {
    beforeEach(() => {
        sdk.S3Client.instances = [];
        sdk.S3Client.headError = null;
        sdk.S3Client.objects.clear();
    });

    it('connects with HeadBucket and round-trips an object', async () => {
        const store = await s3StorageProvider.create(entry(), logger);

        const client = sdk.S3Client.instances[0];
        expect(client?.config).toEqual({
            region: 'us-east-1',
            forcePathStyle: false,
            credentials,
        });
        expect(client?.sent[0]).toBeInstanceOf(sdk.HeadBucketCommand);
        expect(client?.sent[0]?.input).toEqual({ Bucket: 'assets' });

        await store.put('a.txt', 'hello', { contentType: 'text/plain' });
        expect(client?.sent[1]?.input).toMatchObject({ Bucket: 'assets', Key: 'a.txt', ContentType: 'text/plain' });
        expect((await store.get('a.txt')).toString('utf-8')).toBe('hello');

        await store.delete('a.txt');
        await expect(store.get('a.txt')).rejects.toMatchObject({ code: ResourceErrorCode.OBJECT_NOT_FOUND });
    });

    it('defaults the DigitalOcean endpoint from the region', async () => {
        const store = await digitalOceanStorageProvider.create(
            entry({ provider: 'do', region: 'nyc3' }),
            logger
        );

        expect(sdk.S3Client.instances[0]?.config['endpoint']).toBe('https://nyc3.digitaloceanspaces.com');
        expect(store.provider).toBe('do');
        expect(store.getURL('logo.png')).toBe('https://assets.nyc3.digitaloceanspaces.com/logo.png');
    });

    it('requires a region for DigitalOcean', async () => {
        await expect(
            digitalOceanStorageProvider.create(entry({ provider: 'do' }), logger)
        ).rejects.toMatchObject({ code: ResourceErrorCode.PROVIDER_CONFIG_INVALID });
        expect(sdk.S3Client.instances).toHaveLength(0);
    });

    it('uses path style for MinIO', async () => {
        const store = await minioStorageProvider.create(
            entry({ provider: 'minio', endpoint: 'minio.internal:9000' }),
            logger
        );

        expect(sdk.S3Client.instances[0]?.config['forcePathStyle']).toBe(true);
        expect(store.getURL('x.bin')).toBe('https://minio.internal:9000/assets/x.bin');
    });

    it('requires an endpoint for MinIO', async () => {
        await expect(
            minioStorageProvider.create(entry({ provider: 'minio' }), logger)
        ).rejects.toMatchObject({ code: ResourceErrorCode.PROVIDER_CONFIG_INVALID });
    });

    it('fails credentials loading without a client secret', async () => {
        await expect(
            s3StorageProvider.create(entry({ s3: { client_id: 'id', client_secret: '' } }), logger)
        ).rejects.toMatchObject({ code: ResourceErrorCode.CREDENTIALS_LOAD_FAILED });
    });

    it('destroys the client when the bucket is unreachable', async () => {
        sdk.S3Client.headError = new Error('Forbidden');

        await expect(s3StorageProvider.create(entry(), logger)).rejects.toMatchObject({
            code: ResourceErrorCode.CONNECT_FAILED,
        });
        expect(sdk.S3Client.instances[0]?.destroy).toHaveBeenCalledTimes(1);
    });

    it('destroys the client once on close', async () => {
        const store = await s3StorageProvider.create(entry(), logger);

        await store.close();
        await store.close();

        expect(sdk.S3Client.instances[0]?.destroy).toHaveBeenCalledTimes(1);
    });
});
