import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
    GetObjectCommand,
    HeadObjectCommand,
    ListObjectsV2Command,
    NoSuchKey,
    NotFound,
    PutObjectCommand,
    type S3Client
} from '@aws-sdk/client-s3';
import { SinkError } from '../errors';
import { createStorage } from '../storage/factory';
import { FileSystemStorage } from '../storage/fs-storage';
import { S3Storage } from '../storage/s3-storage';
import { MemoryStorage, type PutOptions, type StorageBackend } from '../storage/storage';
import { WEATHER_RAW_CONTAINER, encodeText, writeArtifact } from '../storage/writer';
import { decoder } from './fixtures';

type FakeObject = { body: Uint8Array; contentType?: string };

class InMemoryS3Client {
    readonly objects = new Map<string, FakeObject>();
    readonly buckets = new Set<string>();
    pageSize = 1000;

    async send(command: unknown): Promise<unknown> {
        if (command instanceof PutObjectCommand) {
            const { Bucket, Key, Body, ContentType } = command.input;
            if (!Bucket || !Key || !(Body instanceof Uint8Array)) {
                throw new Error('Bucket, Key and a byte Body are required');
            }
            this.buckets.add(Bucket);
            this.objects.set(Key, { body: Body.slice(), contentType: ContentType });
            return {};
        }

        if (command instanceof HeadObjectCommand) {
            if (!command.input.Key || !this.objects.has(command.input.Key)) {
                throw new NotFound({ $metadata: { httpStatusCode: 404 }, message: 'Not Found' });
            }
            return {};
        }

        if (command instanceof GetObjectCommand) {
            const stored = command.input.Key ? this.objects.get(command.input.Key) : undefined;
            if (!stored) {
                throw new NoSuchKey({ $metadata: { httpStatusCode: 404 }, message: 'The specified key does not exist.' });
            }
            return { Body: { transformToByteArray: async () => stored.body } };
        }

        if (command instanceof ListObjectsV2Command) {
            const prefix = command.input.Prefix ?? '';
            const start = Number(command.input.ContinuationToken ?? '0');
            const keys = Array.from(this.objects.keys()).filter((key) => key.startsWith(prefix)).sort();
            const slice = keys.slice(start, start + this.pageSize);
            const next = start + slice.length;
            return {
                Contents: slice.map((key) => ({ Key: key })),
                IsTruncated: next < keys.length,
                NextContinuationToken: next < keys.length ? String(next) : undefined
            };
        }

        throw new Error('Unsupported command');
    }
}

class FailingStorage implements StorageBackend {
    readonly container = WEATHER_RAW_CONTAINER;
    async exists(): Promise<boolean> {
        return false;
    }
    async put(_key: string, _data: Uint8Array, _options?: PutOptions): Promise<void> {
        throw new Error('disk full');
    }
    async get(): Promise<Uint8Array | null> {
        return null;
    }
    async list(): Promise<string[]> {
        return [];
    }
}

function sharedBehaviour(name: string, create: () => Promise<StorageBackend>) {
    describe(`${name} backend`, () => {

        it('round-trips bytes and reports existence', async () => {
            const storage = await create();
            const key = 'ingestion-v2/2024/03/01/weather_1400.csv';
            expect(await storage.exists(key)).toBe(false);
            expect(await storage.get(key)).toBeNull();

            await storage.put(key, encodeText('a,b\n1,2\n'), { contentType: 'text/csv' });
            expect(await storage.exists(key)).toBe(true);
            expect(decoder.decode((await storage.get(key)) ?? new Uint8Array())).toBe('a,b\n1,2\n');
        });

        it('overwrites in place', async () => {
            const storage = await create();
            const key = 'api-ingestion/Rabat/2024/03/01/14-00_data.json';
            await storage.put(key, encodeText('{"v":1}'));
            await storage.put(key, encodeText('{"v":2}'));

            expect(await storage.list('api-ingestion/')).toEqual([key]);
            expect(decoder.decode((await storage.get(key)) ?? new Uint8Array())).toBe('{"v":2}');
        });

        it('lists by prefix in key order', async () => {
            const storage = await create();
            await storage.put('api-ingestion/Rabat/2024/03/01/14-00_data.json', encodeText('{}'));
            await storage.put('api-ingestion/Agadir/2024/03/01/14-00_data.json', encodeText('{}'));
            await storage.put('ingestion-v2/2024/03/01/weather_1400.csv', encodeText(''));

            expect(await storage.list('api-ingestion/')).toEqual([
                'api-ingestion/Agadir/2024/03/01/14-00_data.json',
                'api-ingestion/Rabat/2024/03/01/14-00_data.json'
            ]);
            expect(await storage.list('nothing/')).toEqual([]);
        });
    });
}

sharedBehaviour('memory', async () => new MemoryStorage(WEATHER_RAW_CONTAINER));

describe('FileSystemStorage', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(path.join(tmpdir(), 'weather-ingest-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    sharedBehaviour('filesystem', async () => new FileSystemStorage(root, WEATHER_RAW_CONTAINER));

    it('writes under <root>/<container>/<key> and leaves no temp files', async () => {
        const storage = new FileSystemStorage(root, WEATHER_RAW_CONTAINER);
        await storage.put('ingestion-v2/2024/03/01/weather_1400.csv', encodeText('x'));

        const dir = path.join(root, WEATHER_RAW_CONTAINER, 'ingestion-v2', '2024', '03', '01');
        expect(await readdir(dir)).toEqual(['weather_1400.csv']);
        expect(await readFile(path.join(dir, 'weather_1400.csv'), 'utf8')).toBe('x');
    });

    it('refuses keys that escape the container', async () => {
        const storage = new FileSystemStorage(root, WEATHER_RAW_CONTAINER);
        await expect(storage.put('../outside.txt', encodeText('x'))).rejects.toThrow('Key escapes storage root');
    });
});

describe('S3Storage', () => {

    sharedBehaviour('s3', async () => new S3Storage(new InMemoryS3Client() as unknown as S3Client, WEATHER_RAW_CONTAINER));

    it('sends the bucket, length and content type', async () => {
        const fake = new InMemoryS3Client();
        const storage = new S3Storage(fake as unknown as S3Client, 'weather-raw');
        await storage.put('k.json', encodeText('{}'), { contentType: 'application/json' });

        expect(fake.buckets.has('weather-raw')).toBe(true);
        expect(fake.objects.get('k.json')?.contentType).toBe('application/json');
    });

    it('follows list continuation tokens', async () => {
        const fake = new InMemoryS3Client();
        fake.pageSize = 2;
        const storage = new S3Storage(fake as unknown as S3Client, 'weather-raw');
        for (const label of ['A', 'B', 'C', 'D', 'E']) {
            await storage.put(`api-ingestion/${label}/x.json`, encodeText('{}'));
        }
        expect(await storage.list('api-ingestion/')).toHaveLength(5);
    });
});

describe('createStorage', () => {

    it('builds the configured backend', () => {
        const base = { container: 'weather-raw', root: './data', s3: {} };
        expect(createStorage({ ...base, backend: 'memory' })).toBeInstanceOf(MemoryStorage);
        expect(createStorage({ ...base, backend: 'fs' })).toBeInstanceOf(FileSystemStorage);
        expect(createStorage({ ...base, backend: 's3', s3: { endpoint: 'http://127.0.0.1:9000' } }))
            .toBeInstanceOf(S3Storage);
    });
});

describe('writeArtifact', () => {

    it('returns a reference with size and checksum', async () => {
        const storage = new MemoryStorage(WEATHER_RAW_CONTAINER);
        const payload = encodeText('{"temp":12}');
        const result = await writeArtifact(storage, 'a/b.json', payload, 'application/json');

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.key).toBe('a/b.json');
            expect(result.value.bytes).toBe(11);
            expect(result.value.checksum).toMatch(/^[0-9a-f]{64}$/);
        }
        expect(storage.describe('a/b.json')?.contentType).toBe('application/json');
    });

    it('wraps backend failures in a SinkError', async () => {
        const result = await writeArtifact(new FailingStorage(), 'a/b.json', encodeText('{}'), 'application/json');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(SinkError);
            expect(result.error.key).toBe('a/b.json');
            expect(result.error.message).toBe('Write to weather-raw/a/b.json failed: disk full');
        }
    });
});
