/**
 * Weather Ingest — S3 Storage Backend
 *
 * StorageBackend over any S3-compatible object store (AWS S3, R2, MinIO).
 * The bucket is the container.
 */

import {
    GetObjectCommand,
    HeadObjectCommand,
    ListObjectsV2Command,
    PutObjectCommand,
    S3Client,
    S3ServiceException,
    type S3ClientConfig
} from '@aws-sdk/client-s3';
import type { PutOptions, StorageBackend } from './storage';

export interface S3StorageOptions {
    bucket: string;
    region?: string;
    endpoint?: string;
    forcePathStyle?: boolean;
    accessKeyId?: string;
    secretAccessKey?: string;
    sessionToken?: string;
}

export function createS3Client(options: S3StorageOptions): S3Client {
    const config: S3ClientConfig = {
        region: options.region ?? 'us-east-1',
        endpoint: options.endpoint,
        forcePathStyle: options.forcePathStyle ?? Boolean(options.endpoint)
    };
    if (options.accessKeyId && options.secretAccessKey) {
        config.credentials = {
            accessKeyId: options.accessKeyId,
            secretAccessKey: options.secretAccessKey,
            sessionToken: options.sessionToken
        };
    }
    return new S3Client(config);
}

function isNotFound(error: unknown): boolean {
    if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) return true;
    const name = error instanceof Error ? error.name : '';
    return name === 'NotFound' || name === 'NoSuchKey';
}

export class S3Storage implements StorageBackend {
    readonly container: string;

    constructor(private client: S3Client, bucket: string) {
        this.container = bucket;
    }

    async exists(key: string): Promise<boolean> {
        try {
            await this.client.send(new HeadObjectCommand({ Bucket: this.container, Key: key }));
            return true;
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
    }

    async put(key: string, data: Uint8Array, options?: PutOptions): Promise<void> {
        // Single PutObject: S3 never exposes a partially written object.
        await this.client.send(
            new PutObjectCommand({
                Bucket: this.container,
                Key: key,
                Body: data,
                ContentLength: data.byteLength,
                ContentType: options?.contentType ?? 'application/octet-stream'
            })
        );
    }

    async get(key: string): Promise<Uint8Array | null> {
        try {
            const result = await this.client.send(new GetObjectCommand({ Bucket: this.container, Key: key }));
            if (!result.Body) return null;
            return await result.Body.transformToByteArray();
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    async list(prefix: string): Promise<string[]> {
        const keys: string[] = [];
        let cursor: string | undefined;

        do {
            const result = await this.client.send(
                new ListObjectsV2Command({
                    Bucket: this.container,
                    Prefix: prefix,
                    MaxKeys: 1000,
                    ContinuationToken: cursor
                })
            );

            for (const object of result.Contents ?? []) {
                if (object.Key) keys.push(object.Key);
            }

            cursor = result.IsTruncated ? result.NextContinuationToken : undefined;
        } while (cursor);

        return keys;
    }
}
