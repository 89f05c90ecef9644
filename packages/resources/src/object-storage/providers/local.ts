import { promises as fs } from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import type { Logger } from '@quay/core';
import { ResourceError } from '../../errors.js';
import { buildObjectURL, validateObjectKey } from '../object-utils.js';
import { defineObjectStorageProvider } from '../provider.js';
import type { BucketAddress, ObjectBody, ObjectStorage } from '../types.js';

export interface LocalStorageConfig extends BucketAddress {
    /** Absolute directory backing the bucket */
    root: string;
    deleteOnClose: boolean;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Bucket stored as a directory on the local filesystem
 */
export class LocalObjectStore implements ObjectStorage {
    readonly provider = 'local';
    private closing: Promise<void> | null = null;

    constructor(
        readonly name: string,
        private readonly config: LocalStorageConfig,
        private readonly logger: Logger
    ) {}

    get bucket(): string {
        return this.config.bucket;
    }

    get root(): string {
        return this.config.root;
    }

    async put(key: string, body: ObjectBody): Promise<void> {
        const filePath = this.resolve(key);
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, body);
    }

    async get(key: string): Promise<Buffer> {
        try {
            return await fs.readFile(this.resolve(key));
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw ResourceError.objectNotFound(this.bucket, key);
            }
            throw error;
        }
    }

    async delete(key: string): Promise<void> {
        await fs.rm(this.resolve(key), { force: true });
    }

    getURL(key: string): string {
        return buildObjectURL(this.config, key);
    }

    close(): Promise<void> {
        this.closing ??= this.cleanup();
        return this.closing;
    }

    private async cleanup(): Promise<void> {
        if (!this.config.deleteOnClose) return;
        this.logger.debug(`Removing local bucket directory ${this.root}`);
        await fs.rm(this.root, { recursive: true, force: true });
    }

    private resolve(key: string): string {
        const filePath = path.resolve(this.root, validateObjectKey(key));
        if (!filePath.startsWith(this.root + path.sep)) {
            throw ResourceError.objectKeyInvalid(key, 'key resolves outside the bucket');
        }
        return filePath;
    }
}

/**
 * Resolve a bucket to a directory strictly inside `baseDir`
 *
 * @throws Error when the bucket is the base directory itself or escapes it
 */
export function resolveBucketDir(baseDir: string, bucket: string): string {
    const base = path.resolve(baseDir);
    const root = path.resolve(base, bucket);
    const relative = path.relative(base, root);
    const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
    if (relative === '' || escapes || path.isAbsolute(relative)) {
        throw new Error(`Bucket '${bucket}' must name a directory inside ${base}`);
    }
    return root;
}

/**
 * Local provider: the bucket is the directory `./<bucket>` under `baseDir`
 * (the working directory at connect time by default). Kept on close unless
 * `local.delete_on_close` is set.
 */
export function createLocalStorageProvider(baseDir?: string) {
    return defineObjectStorageProvider<null, LocalStorageConfig>({
        type: 'local',
        aliases: ['filesystem'],
        async loadCredentials() {
            return null;
        },
        buildConfig(entry) {
            const root = resolveBucketDir(baseDir ?? process.cwd(), entry.bucket);
            const fileURL = pathToFileURL(root).href;
            return {
                bucket: entry.bucket,
                root,
                proto: entry.bucketProto || 'file',
                url: entry.bucketURL || fileURL.replace(/^file:\/\//, ''),
                deleteOnClose: entry.local.deleteOnClose,
            };
        },
        async connect(name, config, logger) {
            await fs.mkdir(config.root, { recursive: true });
            logger.debug(`Local object storage ${name} at ${config.root}`);
            return new LocalObjectStore(name, config, logger);
        },
    });
}

export const localStorageProvider = createLocalStorageProvider();
