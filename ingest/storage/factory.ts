/**
 * Weather Ingest — Storage Factory
 */

import type { IngestConfig } from '../config';
import { FileSystemStorage } from './fs-storage';
import { S3Storage, createS3Client } from './s3-storage';
import { MemoryStorage, type StorageBackend } from './storage';

export function createStorage(config: IngestConfig['storage']): StorageBackend {
    switch (config.backend) {
        case 's3':
            return new S3Storage(
                createS3Client({ bucket: config.container, ...config.s3 }),
                config.container
            );
        case 'memory':
            return new MemoryStorage(config.container);
        case 'fs':
            return new FileSystemStorage(config.root, config.container);
    }
}
