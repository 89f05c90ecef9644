import type { Closable } from '../types.js';

export type ObjectBody = Buffer | Uint8Array | string;

export interface PutObjectOptions {
    contentType?: string;
}

/**
 * Uniform surface over every object storage provider
 */
export interface ObjectStorage extends Closable {
    readonly name: string;
    /** Canonical provider type (aliases resolved) */
    readonly provider: string;
    readonly bucket: string;
    put(key: string, body: ObjectBody, options?: PutObjectOptions): Promise<void>;
    /** @throws QuayRuntimeError `resources_object_not_found` */
    get(key: string): Promise<Buffer>;
    /** Deleting a missing object is not an error */
    delete(key: string): Promise<void>;
    /** Public URL of an object: `<proto>://<bucket url>/<key>` */
    getURL(key: string): string;
}

/**
 * Where a bucket's objects are publicly reachable
 */
export interface BucketAddress {
    bucket: string;
    proto: string;
    url: string;
}
