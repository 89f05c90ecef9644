import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSilentMockLogger } from '@quay/core/test-utils';
import { ResourceErrorCode } from '../../error-codes.js';
import { ObjectStorageEntrySchema } from '../schemas.js';
import { gcsStorageProvider } from './gcs.js';

const gcs = vi.hoisted(() => {
    class FakeFile {
        constructor(
            readonly bucket: FakeBucket,
            readonly key: string
        ) {}

        save = vi.fn(async (data: Buffer) => {
            this.bucket.objects.set(this.key, data);
        });

        download = vi.fn(async () => {
            const data = this.bucket.objects.get(this.key);
            if (!data) {
                throw Object.assign(new Error('No such object'), { code: 404 });
            }
            return [data];
        });

        delete = vi.fn(async () => {
            this.bucket.objects.delete(this.key);
            return [{}];
        });
    }

    class FakeBucket {
        readonly objects = new Map<string, Buffer>();
        exists = vi.fn(async () => [Storage.bucketExists]);

        constructor(readonly name: string) {}

        file(key: string): FakeFile {
            return new FakeFile(this, key);
        }
    }

    class Storage {
        static instances: Storage[] = [];
        static bucketExists = true;

        constructor(readonly options: Record<string, unknown>) {
            Storage.instances.push(this);
        }

        bucket(name: string): FakeBucket {
            return new FakeBucket(name);
        }
    }

    return { Storage };
});

vi.mock('@google-cloud/storage', () => ({ Storage: gcs.Storage }));

const logger = createSilentMockLogger();

const serviceAccountKey = {
    type: 'service_account',
    project_id: 'test-project',
    private_key: 'test-private-key',
    client_email: 'uploader@test-project.iam.gserviceaccount.com',
};

describe('gcsStorageProvider', () => {
    let tempDir: string;
    let keyPath: string;

    beforeEach(async () => {
        gcs.Storage.instances = [];
        gcs.Storage.bucketExists = true;
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'quay-gcs-'));
        keyPath = path.join(tempDir, 'key.json');
        await fs.writeFile(keyPath, JSON.stringify(serviceAccountKey));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    function entry(jsonKey: string | undefined, extra: Record<string, string> = {}) {
        return ObjectStorageEntrySchema.parse({
            name: 'media',
            provider: 'gcs',
            bucket: 'media-bucket',
            ...(jsonKey !== undefined && { gcs: { json_key: jsonKey } }),
            ...extra,
        });
    }

    it('authenticates with the service account key', async () => {
        await gcsStorageProvider.create(entry(keyPath), logger);

        expect(gcs.Storage.instances[0]?.options).toEqual({
            projectId: 'test-project',
            credentials: {
                client_email: 'uploader@test-project.iam.gserviceaccount.com',
                private_key: 'test-private-key',
            },
        });
    });

    it('round-trips objects and reports missing ones', async () => {
        const store = await gcsStorageProvider.create(entry(keyPath), logger);

        await store.put('photos/cat.jpg', 'meow');
        expect((await store.get('photos/cat.jpg')).toString('utf-8')).toBe('meow');

        await store.delete('photos/cat.jpg');
        await expect(store.get('photos/cat.jpg')).rejects.toMatchObject({
            code: ResourceErrorCode.OBJECT_NOT_FOUND,
            message: 'Object not found: media-bucket/photos/cat.jpg',
        });
    });

    it('builds public URLs on storage.googleapis.com by default', async () => {
        const store = await gcsStorageProvider.create(entry(keyPath), logger);

        expect(store.getURL('a.png')).toBe('https://storage.googleapis.com/media-bucket/a.png');
    });

    it('honours a configured bucket address', async () => {
        const store = await gcsStorageProvider.create(
            entry(keyPath, { bucket_proto: 'http', bucket_url: 'media.example.com' }),
            logger
        );

        expect(store.getURL('a.png')).toBe('http://media.example.com/a.png');
    });

    it('fails credentials loading when the key file is missing', async () => {
        await expect(
            gcsStorageProvider.create(entry(path.join(tempDir, 'absent.json')), logger)
        ).rejects.toMatchObject({ code: ResourceErrorCode.CREDENTIALS_LOAD_FAILED });
    });

    it('fails credentials loading when json_key is not configured', async () => {
        await expect(gcsStorageProvider.create(entry(undefined), logger)).rejects.toMatchObject({
            code: ResourceErrorCode.CREDENTIALS_LOAD_FAILED,
            message: "Failed to load credentials for object storage 'media': gcs.json_key is required",
        });
    });

    it('fails credentials loading when the key is not a service account', async () => {
        await fs.writeFile(keyPath, JSON.stringify({ ...serviceAccountKey, type: 'authorized_user' }));

        await expect(gcsStorageProvider.create(entry(keyPath), logger)).rejects.toMatchObject({
            code: ResourceErrorCode.CREDENTIALS_LOAD_FAILED,
        });
    });

    it('fails to connect when the bucket does not exist', async () => {
        gcs.Storage.bucketExists = false;

        await expect(gcsStorageProvider.create(entry(keyPath), logger)).rejects.toMatchObject({
            code: ResourceErrorCode.CONNECT_FAILED,
            message: "Failed to connect to object storage 'media': Bucket media-bucket does not exist",
        });
    });
});
