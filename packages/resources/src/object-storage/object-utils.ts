import { ResourceError } from '../errors.js';
import type { BucketAddress, ObjectBody } from './types.js';

/**
 * Object keys are relative, slash-separated and never climb out of the bucket
 */
export function validateObjectKey(key: string): string {
    if (key.length === 0) {
        throw ResourceError.objectKeyInvalid(key, 'key is empty');
    }
    if (key.startsWith('/')) {
        throw ResourceError.objectKeyInvalid(key, 'key must be relative');
    }
    if (key.includes('\\')) {
        throw ResourceError.objectKeyInvalid(key, 'backslashes are not allowed');
    }
    if (key.split('/').some((segment) => segment === '..' || segment === '.')) {
        throw ResourceError.objectKeyInvalid(key, 'dot segments are not allowed');
    }
    return key;
}

export function buildObjectURL(address: BucketAddress, key: string): string {
    const base = address.url.replace(/\/+$/, '');
    return `${address.proto}://${base}/${validateObjectKey(key)}`;
}

export function toBuffer(body: ObjectBody): Buffer {
    return typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
}
